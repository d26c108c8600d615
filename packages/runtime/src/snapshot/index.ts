// Snapshot boundary: export, load, and JSON text adapters

export { exportSnapshot, loadSnapshot, type SnapshotLoadTarget } from './snapshot.js';
export {
  serializeAccessManager,
  deserializeAccessManager,
  type SerializeOptions,
} from './json.js';
