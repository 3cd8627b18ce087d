export { merge, mergePatches, ReleaseFields } from './merger';
export { applyMergePatch } from './patch';
