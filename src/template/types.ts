/**
 * Template Classification Types
 */

/**
 * Named value to extract from an op result.
 * `alias` is the name to save it under, when different from `name`.
 */
export interface CapturePoint {
  readonly name: string;
  readonly alias?: string | undefined;
}

/** Reference from a template string to a binding spec */
export interface BindPoint {
  /** Binding name; for inline {{spec}} bind points, the spec itself */
  readonly name: string;
  readonly spec: string;
}

export type TemplateSegment =
  | { readonly kind: 'text'; readonly text: string }
  | { readonly kind: 'bind'; readonly bindPoint: BindPoint };

interface ClassificationBase {
  /** The unmodified template string */
  readonly raw: string;
  readonly captures: readonly CapturePoint[];
}

/** No bind points: the string (captures rewritten, escapes removed) is fixed */
export interface LiteralTemplate extends ClassificationBase {
  readonly kind: 'literal';
  readonly text: string;
}

/** The whole string is exactly one bind point */
export interface BindingReferenceTemplate extends ClassificationBase {
  readonly kind: 'bindref';
  readonly bindPoint: BindPoint;
}

/** Text and bind points joined per cycle */
export interface ConcatenationTemplate extends ClassificationBase {
  readonly kind: 'concat';
  readonly segments: readonly TemplateSegment[];
}

export type Classification =
  | LiteralTemplate
  | BindingReferenceTemplate
  | ConcatenationTemplate;

/** Binding name to binding spec */
export type Bindings = Readonly<Record<string, string>>;
