/**
 * Encoder adapter
 *
 * Wraps the `qrcode` package behind a result-returning function. The encoder
 * throws plain Errors; they are classified into a closed set of failure kinds
 * and never rethrown.
 */

import QRCode, { type QRCodeSegment } from "qrcode";

export type ErrorCorrectionLevel = "L" | "M" | "Q" | "H";

export const ERROR_CORRECTION_LEVELS: readonly ErrorCorrectionLevel[] = ["L", "M", "Q", "H"];

/** Version value that lets the encoder pick the smallest fitting symbol */
export const AUTO_VERSION = -1;
export const MIN_VERSION = 1;
export const MAX_VERSION = 40;

// The package refuses an empty string but takes an empty byte segment
const EMPTY_INPUT: QRCodeSegment[] = [{ data: new Uint8Array(0), mode: "byte" }];

/** Immutable square matrix of dark/light modules */
export interface ModuleGrid {
  readonly size: number;
  isDark(row: number, col: number): boolean;
}

export type EncodeFailureKind = "DataTooLong" | "InvalidVersion" | "InvalidConfiguration";

export interface EncodeFailure {
  kind: EncodeFailureKind;
  /** The encoder's reason, as reported */
  message: string;
  /** Raw error thrown by the encoder, when there was one */
  cause?: unknown;
}

export type EncodeResult =
  | { ok: true; grid: ModuleGrid; version: number }
  | { ok: false; failure: EncodeFailure };

export interface EncodeRequest {
  data: string;
  /** 1-40, or AUTO_VERSION */
  version: number;
  errorCorrectionLevel: ErrorCorrectionLevel;
}

/** Something that turns data into a module grid */
export type GridEncoder = (request: EncodeRequest) => EncodeResult;

/** Module count for a given symbol version */
export function moduleCountForVersion(version: number): number {
  return 21 + 4 * (version - 1);
}

export function isValidVersion(version: number): boolean {
  return (
    Number.isInteger(version) &&
    (version === AUTO_VERSION || (version >= MIN_VERSION && version <= MAX_VERSION))
  );
}

export function isErrorCorrectionLevel(value: unknown): value is ErrorCorrectionLevel {
  return ERROR_CORRECTION_LEVELS.some((level) => level === value);
}

/**
 * Build a grid over a flat row-major bit array. The array is copied.
 */
export function createModuleGrid(size: number, data: ArrayLike<number>): ModuleGrid {
  if (!Number.isInteger(size) || size < 1 || data.length !== size * size) {
    throw new RangeError(`Grid data length ${data.length} does not match size ${size}`);
  }
  const cells = Uint8Array.from(data);
  return {
    size,
    isDark: (row: number, col: number) =>
      row >= 0 && row < size && col >= 0 && col < size && cells[row * size + col] !== 0,
  };
}

/**
 * Map an encoder error onto a failure kind
 */
export function classifyEncoderError(error: unknown): EncodeFailure {
  const message = error instanceof Error ? error.message.trim() : String(error);

  // "The amount of data is too big to be stored in a QR Code"
  // "The chosen QR Code version cannot contain this amount of data..."
  if (/too big|cannot contain/i.test(message)) {
    return { kind: "DataTooLong", message, cause: error };
  }
  if (/version/i.test(message)) {
    return { kind: "InvalidVersion", message, cause: error };
  }
  return { kind: "InvalidConfiguration", message, cause: error };
}

/**
 * Encode data with the `qrcode` package.
 *
 * The package silently falls back to defaults for an out-of-range version or
 * an unknown level, so both are checked here first.
 */
export const encodeWithQrcode: GridEncoder = ({ data, version, errorCorrectionLevel }) => {
  if (!isValidVersion(version)) {
    return {
      ok: false,
      failure: {
        kind: "InvalidVersion",
        message: `Invalid QR Code version: ${version} (expected ${AUTO_VERSION} or ${MIN_VERSION}-${MAX_VERSION})`,
      },
    };
  }
  if (!isErrorCorrectionLevel(errorCorrectionLevel)) {
    return {
      ok: false,
      failure: {
        kind: "InvalidConfiguration",
        message: `Unknown error correction level: ${String(errorCorrectionLevel)}`,
      },
    };
  }

  try {
    const qr = QRCode.create(data === "" ? EMPTY_INPUT : data, {
      version: version === AUTO_VERSION ? undefined : version,
      errorCorrectionLevel,
    });
    return {
      ok: true,
      grid: createModuleGrid(qr.modules.size, qr.modules.data),
      version: qr.version,
    };
  } catch (error) {
    return { ok: false, failure: classifyEncoderError(error) };
  }
};
