export { upgrade, upgradeDocument, upgradeReleaseDocument, SPEC_URL, SPEC_VERSION } from './upgrade';
export { legacyLicenseToSpdx } from './licenses';
export { parseLegacyMaintainer, upgradeMaintainers } from './maintainers';
export { legacyPrereqsToDependencies, purlFor } from './dependencies';
