/**
 * Template Module
 * Classifies template strings into literal, binding-reference or
 * concatenation form.
 */

export { classifyTemplate } from './classifier.js';
export type {
  Bindings,
  BindingReferenceTemplate,
  BindPoint,
  CapturePoint,
  Classification,
  ConcatenationTemplate,
  LiteralTemplate,
  TemplateSegment,
} from './types.js';
