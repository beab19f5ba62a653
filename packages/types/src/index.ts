export * from './measurements.js';
export * from './attestation.js';
export * from './vm.js';
export * from './proof.js';
