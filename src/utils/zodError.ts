// src/utils/zodError.ts
import type { ZodError, ZodIssue } from "zod";

export type SimpleIssue = {
  code: string;
  path: string;
  message: string;
  expected?: string;
  received?: string;
};

function simplify(i: ZodIssue): SimpleIssue {
  return {
    code: i.code,
    path: i.path.join("."),
    message: i.message,
    expected: "expected" in i ? String(i.expected) : undefined,
    received: "received" in i ? String(i.received) : undefined,
  };
}

export function formatZodError(err: ZodError) {
  // flatten union branch errors so you can see which branch failed on what
  const union = err.issues
    .flatMap((i) => (i.code === "invalid_union" ? i.unionErrors.flatMap((e) => e.issues) : []))
    .map((i) => ({ ...simplify(i), _union: true }));

  return { top: err.issues.map(simplify), union };
}
