export * from './schemas/common.js';
export * from './schemas/auth.js';
export * from './schemas/user.js';
