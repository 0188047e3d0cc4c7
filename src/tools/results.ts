import { KbError } from "../errors.js";

export function jsonResult(value: unknown) {
  return {
    content: [{ type: "text" as const, text: JSON.stringify(value, null, 2) }],
  };
}

/** Engine errors become tool errors the caller can show; anything else propagates. */
export function kbErrorResult(err: unknown) {
  if (err instanceof KbError) {
    return { isError: true, content: [{ type: "text" as const, text: `[${err.code}] ${err.message}` }] };
  }
  throw err;
}
