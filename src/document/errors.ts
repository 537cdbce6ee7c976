import type { LoadErrorKind } from "./types.js";

export class DocumentLoadError extends Error {
  override name = "DocumentLoadError";

  constructor(
    readonly kind: LoadErrorKind,
    readonly path: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}
