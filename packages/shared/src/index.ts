export * from './interference.js';
