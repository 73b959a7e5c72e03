import type { ValidationError } from "./error";
import { validatorLogger } from "./logger";
import type { SchemaNode } from "./type";
import { isSchemaNode, jsonPointerUnescape } from "./util";

export type ReferenceResolution =
  | { found: true; schema: SchemaNode }
  | { found: false; error: ValidationError };

/**
 * Split the pointer part of a local reference ("#/a/b") into unescaped
 * segments. Returns undefined when the reference is not a local pointer.
 */
export function parseReferencePointer(
  reference: string,
): string[] | undefined {
  if (!reference.startsWith("#/")) {
    return undefined;
  }
  let pointer: string;
  try {
    pointer = decodeURIComponent(reference.slice(2));
  } catch {
    return undefined;
  }
  return pointer.split("/").map(jsonPointerUnescape);
}

/**
 * Resolve a `$ref` within the document it appears in.
 * Supports:
 * - the whole document: #
 * - pointers into the document: #/definitions/address, #/allOf/0
 * Anything else is reported as a remote reference; no I/O is ever attempted.
 */
export function resolveReference(
  root: SchemaNode,
  reference: string,
): ReferenceResolution {
  if (reference === "#") {
    return { found: true, schema: root };
  }

  const segments = parseReferencePointer(reference);
  if (segments === undefined) {
    validatorLogger?.warn(`Remote $ref not supported: ${reference}`);
    return { found: false, error: { kind: "remoteReference", reference } };
  }

  const notFound = (segment: string): ReferenceResolution => ({
    found: false,
    error: { kind: "referenceNotFound", reference, segment },
  });

  let current: SchemaNode = root;
  for (let i = 0; i < segments.length; i++) {
    const segment = segments[i];
    const next: unknown = Object.hasOwn(current, segment)
      ? current[segment]
      : undefined;

    if (isSchemaNode(next)) {
      current = next;
      continue;
    }

    if (Array.isArray(next) && i + 1 < segments.length) {
      const indexSegment = segments[++i];
      const index = /^\d+$/.test(indexSegment) ? Number(indexSegment) : -1;
      const element: unknown = index >= 0 ? next[index] : undefined;
      if (isSchemaNode(element)) {
        current = element;
        continue;
      }
    }

    return notFound(segment);
  }

  return { found: true, schema: current };
}
