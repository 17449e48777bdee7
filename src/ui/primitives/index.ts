// UI Primitives - Menu building blocks
export * from './menu';
