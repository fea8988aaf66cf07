export { staticFileLoader, DEFAULT_STATIC_DIR } from './static-files.js';
