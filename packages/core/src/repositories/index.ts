export { InMemoryObjectStore, compareBy } from './object-store';
export type { ObjectStore, SortDescriptor } from './object-store';
export { WordRepository, LIST_SORT_KEYS } from './word.repository';
export { JsonSnapshotStore } from './json-snapshot.store';
export type { SnapshotStore } from './json-snapshot.store';
export { SnapshotPersistence } from './snapshot-persistence';
