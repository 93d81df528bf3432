/**
 * @module objective
 * @description Scalar objective functions of one variable
 */

export * from './types';
export * from './unimodal-problem';
