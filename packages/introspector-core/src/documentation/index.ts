export * from './contract.js';
export * from './documentation-request.js';
