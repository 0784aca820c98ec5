import { requiredFieldsFor } from "../config";
import type { DocumentSchema } from "../config";
import type { DocumentType, FieldMap, ValidationError } from "../types";
import { VALIDATION_RULES } from "./rules";
import type { ValidationRule } from "./rules";

export interface ValidatorOptions {
  schema: DocumentSchema;
  confidenceFloor: number;
  clock?: () => Date;
  rules?: readonly ValidationRule[];
}

export class Validator {
  private readonly schema: DocumentSchema;
  private readonly confidenceFloor: number;
  private readonly clock: () => Date;
  private readonly rules: readonly ValidationRule[];

  constructor(options: ValidatorOptions) {
    this.schema = options.schema;
    this.confidenceFloor = options.confidenceFloor;
    this.clock = options.clock ?? (() => new Date());
    this.rules = options.rules ?? VALIDATION_RULES;
  }

  validate(documentType: DocumentType, fields: FieldMap): ValidationError[] {
    const context = {
      documentType,
      fields,
      requiredFields: requiredFieldsFor(this.schema, documentType),
      today: this.clock().toISOString().slice(0, 10),
      confidenceFloor: this.confidenceFloor,
    };
    return this.rules.flatMap((rule) =>
      rule.check(context).map((violation) => ({
        field: violation.field,
        ruleId: rule.id,
        message: violation.message,
        severity: rule.severity,
      })),
    );
  }
}

export function hasBlockingErrors(errors: readonly ValidationError[]): boolean {
  return errors.some((error) => error.severity === "blocking");
}
