export { BoundedRegion, defaultStart } from './BoundedRegion.js';
