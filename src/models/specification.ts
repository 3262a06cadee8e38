// Normalized specification consumed by the drift detector

export type ElementKind = 'symbol' | 'dependency';

/**
 * One element the implementation is expected to provide
 */
export interface ExpectedElement {
  /** Identifier the extractor reports for this element (e.g. `calc`, `pkg:zod`) */
  id: string;
  /** Expected signature, or version constraint for dependencies */
  signature: string;
  /** Expected behavior hash; falls back to the first observed hash when absent */
  behaviorHash?: string;
  /** Human-readable behavior description */
  description?: string;
  /** Public API: removal or incompatible change breaks consumers */
  isBreakingIfRemoved: boolean;
  kind: ElementKind;
}

/**
 * A loaded specification. Owned by the loader; read-only for the core.
 */
export interface Specification {
  name: string;
  /** Where the specification came from (file path, URL, ...) */
  sourceRef: string;
  /** Document revision; a change with no code change marks docs stale */
  revision?: string;
  elements: readonly ExpectedElement[];
}

/**
 * Observed state of one element, as reported by the signature extractor
 */
export interface ObservedSignature {
  signature: string;
  behaviorHash?: string;
  line?: number;
}

/**
 * Current signatures for one file, keyed by element id
 */
export type CurrentSignatures = Readonly<Record<string, ObservedSignature>>;

/**
 * Supplies the specification for a path
 */
export interface SpecificationProvider {
  /**
   * @returns the specification, or undefined when none covers the path
   * @throws SpecLoadError when a specification exists but cannot be loaded
   */
  getSpecification(filePath: string): Promise<Specification | undefined>;
}

/**
 * Supplies current signatures for a file
 */
export interface SignatureExtractor {
  extract(filePath: string): Promise<CurrentSignatures>;
}
