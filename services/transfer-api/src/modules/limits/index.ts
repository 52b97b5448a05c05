export { LimitAccountant, type LimitSnapshotWriter } from './accountant.js';
