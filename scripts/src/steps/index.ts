/**
 * gcc-forge - Steps Index
 */

export * from './common.js';
export * from './binutils.js';
export * from './headers.js';
export * from './gcc.js';
export * from './glibc.js';
export * from './newlib.js';
export * from './package.js';
