import Ajv2020 from 'ajv/dist/2020';
import addFormats from 'ajv-formats';
import { isGlob, isPath } from '../primitives/path';
import { isLicenseExpression } from '../primitives/license';

/**
 * Register the string formats the metadata schemas use. `uri`, `email` and
 * `date-time` come from ajv-formats; the rest are domain grammars.
 */
export function registerFormats(ajv: Ajv2020): void {
  addFormats(ajv, ['uri', 'email', 'date-time']);
  ajv.addFormat('path', { type: 'string', validate: isPath });
  ajv.addFormat('glob', { type: 'string', validate: isGlob });
  ajv.addFormat('license', { type: 'string', validate: isLicenseExpression });
}
