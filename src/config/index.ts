/**
 * Config Module
 * Activity configuration, op templates and workload loading.
 */

export {
  convertKind,
  createActivityConfig,
  type ActivityConfig,
} from './activity-config.js';
export {
  createOpTemplate,
  STMT_FIELD,
  toFieldMap,
  type FieldMapInput,
  type OpTemplate,
  type OpTemplateInit,
} from './op-template.js';
export { loadWorkload, type Workload } from './workload.js';
