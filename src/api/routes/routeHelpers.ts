import { Response } from "express";
import { DistributionErrorKind } from "../../domain/distribution";
import { ValidationError } from "../../domain/validationError";

// ============================================
// Request body coercion
// ============================================

export function optionalString(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

/**
 * undefined = leave unchanged, null = clear the reference
 */
export function nullableString(value: unknown): string | null | undefined {
  if (value === null || value === "") {
    return null;
  }
  return optionalString(value);
}

export function optionalNumber(value: unknown): number | undefined {
  if (typeof value === "number") {
    return value;
  }
  if (typeof value === "string" && value.trim() !== "" && !Number.isNaN(Number(value))) {
    return Number(value);
  }
  return undefined;
}

export function optionalBoolean(value: unknown): boolean | undefined {
  if (typeof value === "boolean") {
    return value;
  }
  if (value === "true" || value === "false") {
    return value === "true";
  }
  return undefined;
}

export function optionalStringArray(value: unknown): string[] | undefined {
  if (!Array.isArray(value)) {
    return undefined;
  }
  return value.filter((item): item is string => typeof item === "string");
}

// ============================================
// Responses
// ============================================

/**
 * 400 for validation problems, 500 (logged) for anything else
 */
export function sendStoreError(res: Response, error: unknown, action: string): Response {
  if (error instanceof ValidationError) {
    return res.status(400).json({ error: error.message, details: error.details });
  }
  console.error(`Error ${action}:`, error);
  return res.status(500).json({ error: `Failed to ${action}` });
}

export function statusCodeFor(result: { success: boolean; errorKind?: DistributionErrorKind }): number {
  if (result.success) {
    return 200;
  }
  switch (result.errorKind) {
    case "not_found":
      return 404;
    case "precondition":
      return 400;
    default:
      return 500;
  }
}
