export * from './document.js';
export * from './chunk.js';
export * from './query.js';
export * from './events.js';
export * from './errors.js';
export * from './collaborators.js';
