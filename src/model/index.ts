export { Distribution } from './distribution';
export { LegacyDistribution } from './legacy';
export { Release } from './release';
export { detectGeneration } from './generation';
export { EngineOptions, resolveOptions } from './options';
export { checkDistribution, checkLegacyDistribution } from './semantic';
export { loadDistribution, loadRelease, readDocument } from './load';
