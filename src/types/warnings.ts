export type CombineWarningCode =
  | "NO_FUNCTIONAL_DATA"
  | "NO_FIELDMAP_DATA"
  | "UNRECOGNIZED_DIRECTION"
  | "INTENDED_FOR_NOT_REWRITTEN";

export interface CombineWarning {
  code: CombineWarningCode;
  message: string;
}
