/**
 * Input modes.
 * A run either fans out over a list file or analyses one sample.
 */

export type SingleSampleInput =
  | { readonly kind: "matrix"; readonly matrixPath: string }
  | { readonly kind: "reference"; readonly referencePath: string; readonly db: string };

export type InputMode =
  | { readonly kind: "matrixList"; readonly listPath: string }
  | { readonly kind: "referenceList"; readonly listPath: string; readonly db: string }
  | { readonly kind: "singleSample"; readonly input: SingleSampleInput };

export type MultiSampleMode = Extract<InputMode, { kind: "matrixList" | "referenceList" }>;

export type InputModeKind = InputMode["kind"];
