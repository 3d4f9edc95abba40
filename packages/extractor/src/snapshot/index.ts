export { takeSnapshot } from './snapshot';
