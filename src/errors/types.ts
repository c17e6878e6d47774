export type LinterErrorKind =
  | "usage"
  | "configuration"
  | "collaborator"
  | "arithmetic";

export const USAGE_MESSAGE =
  "Please provide the model file path as an argument.";
