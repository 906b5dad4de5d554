/** One rule applied to one field of a submission. */
export interface FieldRule {
  field: string;
  rule: string;
  param?: string;

  message?: string;
  stop_on_fail?: boolean;
}
