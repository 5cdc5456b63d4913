export { RecordRegistry, DEFAULT_REGISTRY, getLayout } from './registry.js';
