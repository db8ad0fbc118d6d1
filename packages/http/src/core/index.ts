// Pure building blocks of request assembly and response classification

export * from './abort.js';
export * from './headers.js';
export * from './http-utils.js';
export * from './parameters.js';
export * from './path-template.js';
export * from './representable.js';
export * from './response-classifier.js';
