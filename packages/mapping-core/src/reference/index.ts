export { IndexSnapshot, toReferenceEntity } from './index-snapshot.js';
export type { ApproximateCandidate, IndexSnapshotOptions } from './index-snapshot.js';
export { ReferenceStore } from './reference-store.js';
export type { ReferenceStoreOptions, ReferenceStoreStatus } from './reference-store.js';
