// src/core/errors/convert.ts
// Conversion between LangError and the ErrorObject value bound by Catch

import type { ErrorVal } from "../values/values";
import type { LangError } from "./errors";

export function errorValue(e: LangError): ErrorVal {
  return { tag: "Error", kind: e.kind, code: e.code, category: e.category, message: e.message };
}
