export * from './errors';
export * from './result';
export * from './matrix';
export { addSub, add, subtract, multiply, transpose } from './operations/elementwise';
export * from './linalg';
