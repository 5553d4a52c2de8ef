// Vocabulary and extraction types
export * from './base.js';

// Menu, cart and order types
export * from './domain.js';

// Dialogue session types
export * from './session.js';

// Store capability interfaces
export * from './store.js';

// Collaborator interfaces
export * from './providers.js';

// Context and handler types
export * from './context.js';
export * from './handlers.js';

// Pipeline types
export * from './pipeline.js';
