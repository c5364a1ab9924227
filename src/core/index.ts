export * from './errors.js';
export * from './routing/index.js';
export * from './validation/index.js';
export { loadDomainCatalog, loadDepartmentCatalog, clearCatalogCache } from './routing/catalog-loader-node.js';
export { readArtifact, detectSiblings, defaultArtifactPath } from './validation/artifact-reader-node.js';
export { scanRepository } from './validation/repository-scanner-node.js';
export { readInput, type InputSource, type StdinLike } from './input/read-input-node.js';
