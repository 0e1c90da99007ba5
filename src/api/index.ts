export { createApp } from './app';
export { ApiState, createApiState } from './state';
export { requireAdminKey } from './middleware/adminAuth';
