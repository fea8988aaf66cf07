export { ComponentRegistry } from './component-registry.js';
