/**
 * Document-side business rules applied on every write: timestamp stamping,
 * per-collection required fields and field transforms.
 */
import { REQUIRED_FIELDS } from "@config/businessRules";
import {
  getField,
  hasField,
  setField,
  type Document,
} from "@domain/document/Document";
import { ValidationError } from "@typesLocal/AppError";

/** RFC 3339 with second precision, e.g. 2024-05-01T09:30:00Z. */
export function formatTimestamp(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, "Z");
}

function capitalize(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1);
}

export function validateDocument(doc: Document): void {
  if (doc.collection === "") {
    throw new ValidationError("Document index cannot be empty");
  }

  if (Object.keys(doc.fields).length === 0) {
    throw new ValidationError("Document source cannot be empty");
  }
}

export function validateRequiredFields(doc: Document): void {
  const required = Object.hasOwn(REQUIRED_FIELDS, doc.collection)
    ? REQUIRED_FIELDS[doc.collection]
    : [];

  for (const field of required) {
    if (!hasField(doc, field)) {
      throw new ValidationError(
        `${capitalize(field)} field is required for ${doc.collection} index`,
        { details: `missing field: ${field}` }
      );
    }
  }
}

function applyDataTransformations(doc: Document, now: Date): Document {
  let transformed = doc;

  const email = getField(transformed, "email");
  if (typeof email === "string") {
    transformed = setField(transformed, "email", email.toLowerCase(), now);
  }

  const firstName = getField(transformed, "first_name");
  const lastName = getField(transformed, "last_name");
  if (typeof firstName === "string" && typeof lastName === "string") {
    transformed = setField(
      transformed,
      "full_name",
      `${firstName} ${lastName}`,
      now
    );
  }

  return transformed;
}

export function applyDocumentBusinessRules(
  doc: Document,
  now: Date = new Date()
): Document {
  const timestamp = formatTimestamp(now);
  let ruled = doc;

  if (!hasField(ruled, "created_at")) {
    ruled = setField(ruled, "created_at", timestamp, now);
  }

  // updated_at moves on every write, so this rule is not idempotent.
  ruled = setField(ruled, "updated_at", timestamp, now);

  validateRequiredFields(ruled);

  return applyDataTransformations(ruled, now);
}
