export type WindowSortErrorCode = "INVALID_CAPACITY" | "INVALID_COMPARATOR" | "INCOMPARABLE_ELEMENTS";

/**
 * Raised for arguments a window sort cannot work with.
 * Upstream failures are never wrapped in this type; they surface as thrown.
 */
export class WindowSortError extends Error {
  readonly code: WindowSortErrorCode;
  readonly title: string;
  readonly value: unknown;

  constructor(code: WindowSortErrorCode, detail: string, value?: unknown) {
    super(`${codeToTitle(code)}: ${detail}`);
    this.name = "WindowSortError";
    this.code = code;
    this.title = codeToTitle(code);
    this.value = value;
  }
}

function codeToTitle(code: WindowSortErrorCode): string {
  switch (code) {
    case "INVALID_CAPACITY":
      return "Invalid capacity";
    case "INVALID_COMPARATOR":
      return "Invalid comparator";
    case "INCOMPARABLE_ELEMENTS":
      return "Incomparable elements";
  }
}

export function isWindowSortError(v: unknown): v is WindowSortError {
  return v instanceof WindowSortError;
}
