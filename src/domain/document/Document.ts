/**
 * Document entity owned by the document lifecycle.
 *
 * Version starts at 1 and moves up by one on every field replacement. It is
 * advisory bookkeeping only: nothing compares it against the backend.
 */
import { cloneJsonObject, type JsonObject, type JsonValue } from "@domain/shared/json";

export interface Document {
  id: string;
  collection: string;
  fields: JsonObject;
  version: number;
  createdAt: Date;
  modifiedAt: Date;
}

export function createDocument(
  collection: string,
  fields: JsonObject,
  now: Date = new Date()
): Document {
  return {
    id: "",
    collection,
    fields: cloneJsonObject(fields),
    version: 1,
    createdAt: now,
    modifiedAt: now,
  };
}

export function withId(doc: Document, id: string): Document {
  return { ...doc, id };
}

/** Full replacement of the field map; nothing from the previous fields survives. */
export function replaceFields(
  doc: Document,
  fields: JsonObject,
  now: Date = new Date()
): Document {
  return {
    ...doc,
    fields: cloneJsonObject(fields),
    version: doc.version + 1,
    modifiedAt: now,
  };
}

export function getField(doc: Document, field: string): JsonValue | undefined {
  return Object.hasOwn(doc.fields, field) ? doc.fields[field] : undefined;
}

export function hasField(doc: Document, field: string): boolean {
  return Object.hasOwn(doc.fields, field);
}

export function setField(
  doc: Document,
  field: string,
  value: JsonValue,
  now: Date = new Date()
): Document {
  return {
    ...doc,
    fields: { ...doc.fields, [field]: value },
    modifiedAt: now,
  };
}
