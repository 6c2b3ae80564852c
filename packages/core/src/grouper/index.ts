export { flattenElements, groupTokens } from './grouper.js';
export { findAngleClose } from './angle.js';
