export { CatalogRepository } from './repository.js';
export type { CatalogPort, Corridor, KycProfile } from './types.js';
