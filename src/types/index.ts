/**
 * Shared type exports: the Result type and the repository tool contract.
 */

export * from './core';
export * from './tool';
