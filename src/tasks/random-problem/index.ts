/**
 * @module tasks/random-problem
 * @description Random unimodal problem solved by golden-section search
 */

export * from './config';
export * from './task';
