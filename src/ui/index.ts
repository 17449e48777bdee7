// UI Components - Main export
export * from './primitives';
