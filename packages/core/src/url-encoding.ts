import type { ParameterValue, Parameters } from "./types.js";

/**
 * Flattens parameters into form-encoding pairs.
 *
 * - arrays: `tags[]=a&tags[]=b`
 * - nested objects: `user[name]=a`
 * - booleans: `1` / `0`
 * - null: empty value
 */
export function toEncodedPairs(parameters: Readonly<Parameters>): Array<[string, string]> {
  const pairs: Array<[string, string]> = [];
  for (const [key, value] of Object.entries(parameters)) {
    collectPairs(key, value, pairs);
  }
  return pairs;
}

function collectPairs(key: string, value: ParameterValue, pairs: Array<[string, string]>): void {
  if (Array.isArray(value)) {
    for (const element of value) {
      collectPairs(`${key}[]`, element, pairs);
    }
    return;
  }
  if (value !== null && typeof value === "object") {
    for (const [nestedKey, nestedValue] of Object.entries(value)) {
      collectPairs(`${key}[${nestedKey}]`, nestedValue, pairs);
    }
    return;
  }
  pairs.push([key, formatScalar(value)]);
}

function formatScalar(value: string | number | boolean | null): string {
  if (value === null) return "";
  if (typeof value === "boolean") return value ? "1" : "0";
  return String(value);
}

/**
 * Encodes parameters as an `application/x-www-form-urlencoded` string.
 */
export function encodeFormBody(parameters: Readonly<Parameters>): string {
  return new URLSearchParams(toEncodedPairs(parameters)).toString();
}

/**
 * Appends parameters to a URL's query string, keeping any query it already has.
 */
export function appendQuery(url: string, parameters: Readonly<Parameters>): string {
  const queryString = encodeFormBody(parameters);
  if (!queryString) return url;
  return `${url}${url.includes("?") ? "&" : "?"}${queryString}`;
}
