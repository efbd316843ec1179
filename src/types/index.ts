export * from './screen.js';
export * from './action.js';
export * from './device.js';
