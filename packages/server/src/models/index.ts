export { ModelStore } from './ModelStore.js';

export type { NewModel, StoredModel } from './ModelStore.js';
