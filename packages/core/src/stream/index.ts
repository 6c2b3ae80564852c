export { TokenInputStream } from './token-stream.js';
