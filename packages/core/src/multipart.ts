import type { MultipartFormSink, ParameterValue, Parameters } from "./types.js";
import { noopLogger, type Logger } from "./logger.js";

export type FileKind = "file" | "image" | "video";

export const FileExtension = {
  png: ".png",
  jpg: ".jpg",
  jpeg: ".jpeg",
  mp4: ".mp4",
  mp3: ".mp3",
  mkv: ".mkv",
  txt: ".txt",
} as const;

export type FileExtension = (typeof FileExtension)[keyof typeof FileExtension];

/**
 * One file to upload under a multipart field.
 */
export interface MultipartFieldValue {
  kind: FileKind;
  extension: FileExtension;
  data: Uint8Array;
}

export type MultipartFields = Record<string, MultipartFieldValue>;

const LONE_SURROGATE = /\p{Cs}/u;

function stripDot(extension: FileExtension): string {
  return extension.startsWith(".") ? extension.slice(1) : extension;
}

export function mimeTypeOf(value: MultipartFieldValue): string {
  return `${value.kind}/${stripDot(value.extension)}`;
}

/**
 * Appends every file field, then every parameter, to `form`.
 *
 * Each file gets a fresh `<uuid>.<ext>` filename. Array parameters are appended
 * element by element under `key[]`; everything else is stringified under `key`.
 * Values whose text contains a lone surrogate cannot be written as UTF-8 and are
 * skipped.
 */
export function appendMultipartFields<TForm extends MultipartFormSink>(
  form: TForm,
  fields: MultipartFields,
  parameters: Readonly<Parameters>,
  logger: Logger = noopLogger,
): TForm {
  for (const [name, value] of Object.entries(fields)) {
    const fileName = `${crypto.randomUUID()}.${stripDot(value.extension)}`;
    form.append(name, new Blob([value.data], { type: mimeTypeOf(value) }), fileName);
  }

  for (const [key, value] of Object.entries(parameters)) {
    if (Array.isArray(value)) {
      for (const element of value) {
        appendParameter(form, `${key}[]`, element, logger);
      }
    } else {
      appendParameter(form, key, value, logger);
    }
  }

  return form;
}

/**
 * Builds a fresh `FormData` holding `fields` and `parameters`.
 */
export function buildMultipartBody(
  fields: MultipartFields,
  parameters: Readonly<Parameters>,
  logger: Logger = noopLogger,
): FormData {
  return appendMultipartFields(new FormData(), fields, parameters, logger);
}

function appendParameter(
  form: MultipartFormSink,
  key: string,
  value: ParameterValue,
  logger: Logger,
): void {
  const text = stringifyParameter(value);
  if (LONE_SURROGATE.test(text)) {
    logger.warn("Skipping multipart parameter that is not valid UTF-8", { key });
    return;
  }
  form.append(key, text);
}

function stringifyParameter(value: ParameterValue): string {
  if (value === null) return "null";
  if (typeof value === "object") return JSON.stringify(value);
  return String(value);
}
