import type { DocumentType, FieldFlag, FieldMap, FieldResult, ValidationSeverity } from "../types";

export interface ValidationContext {
  documentType: DocumentType;
  fields: FieldMap;
  requiredFields: readonly string[];
  today: string;
  confidenceFloor: number;
}

export interface RuleViolation {
  field: string;
  message: string;
}

export interface ValidationRule {
  id: string;
  severity: ValidationSeverity;
  check(context: ValidationContext): RuleViolation[];
}

export const ALLOWED_DISTRIBUTION_TYPES = ["ROC", "CI"];

const DATE_FIELDS = ["call_date", "distribution_date", "valuation_date"];
const AMOUNT_FIELDS = ["call_amount", "amount", "final_valuation"];
const CURRENCY_AMOUNT_FIELD: Partial<Record<DocumentType, string>> = {
  capital_call: "call_amount",
  distribution_notice: "amount",
  valuation_report: "final_valuation",
};

function present(fields: FieldMap, names: readonly string[]): FieldResult[] {
  return names.flatMap((name) => {
    const field = fields[name];
    return field && field.value !== null ? [field] : [];
  });
}

function flagged(fields: FieldMap, flag: FieldFlag, message: (field: FieldResult) => string): RuleViolation[] {
  return Object.values(fields)
    .filter((field) => field.flags.includes(flag))
    .map((field) => ({ field: field.name, message: message(field) }));
}

export const VALIDATION_RULES: readonly ValidationRule[] = [
  {
    id: "document_type_determined",
    severity: "blocking",
    check: ({ documentType }) =>
      documentType === "unclassified" ? [{ field: "document", message: "document type could not be determined" }] : [],
  },
  {
    id: "required_field_present",
    severity: "blocking",
    check: ({ fields, requiredFields }) =>
      requiredFields.flatMap((name) => {
        const field = fields[name];
        if (field && field.confidence > 0 && field.value !== null) {
          return [];
        }
        const detail = field?.evidence ? ` (${field.evidence})` : "";
        return [{ field: name, message: `required field "${name}" is missing${detail}` }];
      }),
  },
  {
    id: "date_not_in_future",
    severity: "blocking",
    check: ({ fields, today }) =>
      present(fields, DATE_FIELDS).flatMap((field) =>
        field.value?.kind === "date" && field.value.value > today
          ? [{ field: field.name, message: `${field.name} ${field.value.value} is after ${today}` }]
          : [],
      ),
  },
  {
    id: "amount_positive",
    severity: "blocking",
    check: ({ fields }) =>
      present(fields, AMOUNT_FIELDS).flatMap((field) =>
        field.value?.kind === "amount" && !(Number(field.value.value) > 0)
          ? [{ field: field.name, message: `${field.name} must be positive, got ${field.value.value}` }]
          : [],
      ),
  },
  {
    id: "call_number_positive",
    severity: "blocking",
    check: ({ fields }) =>
      present(fields, ["call_number"]).flatMap((field) =>
        field.value?.kind === "integer" && field.value.value < 1
          ? [{ field: field.name, message: `call_number must be at least 1, got ${field.value.value}` }]
          : [],
      ),
  },
  {
    id: "distribution_type_allowed",
    severity: "blocking",
    check: ({ fields }) =>
      present(fields, ["distribution_type"]).flatMap((field) =>
        field.value?.kind === "enum" && !ALLOWED_DISTRIBUTION_TYPES.includes(field.value.value)
          ? [
              {
                field: field.name,
                message: `distribution_type must be one of ${ALLOWED_DISTRIBUTION_TYPES.join(", ")}, got ${field.value.value}`,
              },
            ]
          : [],
      ),
  },
  {
    id: "currency_matches_amount",
    severity: "warning",
    check: ({ documentType, fields }) => {
      const amountField = CURRENCY_AMOUNT_FIELD[documentType];
      const currency = fields.currency?.value;
      const amount = amountField ? fields[amountField]?.value : undefined;
      if (currency?.kind !== "enum" || amount?.kind !== "amount" || currency.value === amount.currency) {
        return [];
      }
      return [{ field: "currency", message: `currency ${currency.value} does not match ${amountField} currency ${amount.currency}` }];
    },
  },
  {
    id: "ambiguous_date_format",
    severity: "warning",
    check: ({ fields }) =>
      flagged(fields, "ambiguous_date", (field) => `"${field.rawSpan}" could be read day-first or month-first; read month-first`),
  },
  {
    id: "inferred_currency",
    severity: "warning",
    check: ({ fields }) => flagged(fields, "inferred_currency", (field) => `currency of "${field.rawSpan}" was inferred`),
  },
  {
    id: "unrecognized_identifier_format",
    severity: "warning",
    check: ({ fields }) =>
      flagged(fields, "unrecognized_identifier", (field) => `"${field.rawSpan}" does not match the known ${field.name} format`),
  },
  {
    id: "confidence_floor",
    severity: "warning",
    check: ({ fields, confidenceFloor }) =>
      Object.values(fields)
        .filter((field) => field.confidence > 0 && field.confidence < confidenceFloor)
        .map((field) => ({ field: field.name, message: `${field.name} confidence ${field.confidence} is below ${confidenceFloor}` })),
  },
];
