import type { z } from "zod";
import { DecodingError } from "./errors.js";

export interface Decoded<T> {
  readonly _tag: "Decoded";
  readonly value: T;
}

export interface DecodeFailed {
  readonly _tag: "DecodeFailed";
  readonly error: DecodingError;
}

export type DecodeResult<T> = Decoded<T> | DecodeFailed;

/**
 * Turns response bytes into a value of a declared shape.
 */
export interface Decoder<T> {
  decode(bytes: Uint8Array): DecodeResult<T>;
}

export type InferDecoded<TDecoder> = TDecoder extends Decoder<infer T> ? T : never;

const utf8 = new TextDecoder("utf-8", { fatal: true });

/**
 * Decodes UTF-8 JSON and validates it against a zod schema.
 *
 * An empty body reaches the schema as `undefined`, so `z.void()` or
 * `z.undefined()` accept bodiless responses and object schemas reject them.
 *
 * @example
 * ```typescript
 * const decoder = jsonDecoder(z.object({ token: z.string() }));
 * const result = decoder.decode(new TextEncoder().encode('{"token":"abc"}'));
 * // { _tag: "Decoded", value: { token: "abc" } }
 * ```
 */
export function jsonDecoder<TSchema extends z.ZodTypeAny>(
  schema: TSchema,
): Decoder<z.output<TSchema>> {
  return {
    decode(bytes) {
      let data: unknown;
      if (bytes.byteLength > 0) {
        try {
          data = JSON.parse(utf8.decode(bytes));
        } catch (error: unknown) {
          return {
            _tag: "DecodeFailed",
            error: new DecodingError(
              `Response body is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
              [],
              error,
            ),
          };
        }
      }

      const parsed = schema.safeParse(data);
      if (parsed.success) {
        return { _tag: "Decoded", value: parsed.data };
      }
      return {
        _tag: "DecodeFailed",
        error: new DecodingError(
          bytes.byteLength === 0
            ? "Response body is empty"
            : "Response body does not match the declared shape",
          parsed.error.issues,
          parsed.error,
        ),
      };
    },
  };
}
