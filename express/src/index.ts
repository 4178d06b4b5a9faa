export * from './http/denial.js';
export * from './middleware/accessFilter.js';
export * from './middleware/identity.js';
