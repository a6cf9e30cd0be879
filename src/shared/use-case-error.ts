import type { z } from "zod";
import { toValidationIssues, type ValidationIssue } from "../validation/schemas";

export type UseCaseErrorKind = "invalid_input" | "not_found" | "protected";

export interface UseCaseError {
  kind: UseCaseErrorKind;
  error: string;
  issues?: ValidationIssue[];
}

export function invalidInput(error: z.ZodError): UseCaseError {
  return {
    kind: "invalid_input",
    error: "Invalid input",
    issues: toValidationIssues(error),
  };
}

export function invalidValue(error: string): UseCaseError {
  return { kind: "invalid_input", error };
}

export function notFound(error: string): UseCaseError {
  return { kind: "not_found", error };
}

export function protectedRecord(error: string): UseCaseError {
  return { kind: "protected", error };
}
