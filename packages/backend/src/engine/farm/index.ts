export { ColorPartition } from './color-partition.js';
