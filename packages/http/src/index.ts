// Declarative HTTP endpoints with authenticated, retrying delivery
export * from './client.js';
export * from './codecs.js';
export * from './endpoint.js';
export * from './errors.js';
export * from './request-assembler.js';
export * from './server.js';
export * from './transport.js';
export * from './types.js';

export * from './auth/index.js';

// Export pure functional core
export * from './core/index.js';
