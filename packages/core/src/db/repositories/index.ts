export { AssetRepository, toAsset } from './assetRepository.js';
export { LibraryRepository } from './libraryRepository.js';
export { TenantRepository } from './tenantRepository.js';
