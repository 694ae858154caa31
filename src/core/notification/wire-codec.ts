import { isLosslessNumber, parse as parseLossless, stringify as stringifyLossless } from 'lossless-json';
import { WireFormat } from '../domain/enums';
import { FormatError } from '../domain/errors';
import { DEFAULT_XML_ROOT, ParamMap, XmlMap } from '../domain/models';
import { renderParamValue } from '../signing/canonicalization';
import { RawNotification } from './types';

const utf8 = new TextDecoder('utf-8', { fatal: true });

export function toBuffer(raw: RawNotification): Buffer {
  if (typeof raw === 'string') {
    return Buffer.from(raw, 'utf8');
  }
  return Buffer.isBuffer(raw) ? raw : Buffer.from(raw);
}

/**
 * Strict UTF-8 decode
 * @throws FormatError on invalid byte sequences
 */
export function decodeText(bytes: Buffer): string {
  try {
    return utf8.decode(bytes);
  } catch (error) {
    throw new FormatError('Notification body is not valid UTF-8', {
      reason: error instanceof Error ? error.message : String(error),
    });
  }
}

/**
 * Decode a notification body into a container. Empty values are kept so the
 * signing string can be rebuilt exactly as the provider saw the fields.
 */
export function decodePayload(
  format: WireFormat,
  text: string,
  xmlRootTag: string = DEFAULT_XML_ROOT,
): ParamMap {
  switch (format) {
    case WireFormat.FORM:
      return decodeForm(text);
    case WireFormat.XML:
      return XmlMap.parse(text, xmlRootTag).toParamMap();
    case WireFormat.JSON:
      return decodeJson(text);
  }
}

/**
 * Serialize a signed container for transport
 */
export function encodePayload(
  format: WireFormat,
  params: ParamMap,
  xmlRootTag: string = DEFAULT_XML_ROOT,
): string {
  switch (format) {
    case WireFormat.FORM:
      return params.toQueryText();
    case WireFormat.XML:
      return XmlMap.fromParamMap(params, xmlRootTag).serialize();
    case WireFormat.JSON:
      return params.toJsonText();
  }
}

/**
 * `application/x-www-form-urlencoded`; the first occurrence of a repeated key wins
 */
function decodeForm(text: string): ParamMap {
  const fields = new Map<string, string>();
  for (const [key, value] of new URLSearchParams(text)) {
    if (!fields.has(key)) {
      fields.set(key, value);
    }
  }
  return ParamMap.fromRecord(Object.fromEntries(fields), { keepEmpty: true });
}

/**
 * JSON object body. Numbers keep their wire text, scalars become text and
 * nested values their JSON text.
 */
function decodeJson(text: string): ParamMap {
  let parsed: unknown;
  try {
    parsed = parseLossless(text);
  } catch (error) {
    throw new FormatError('Notification body is not valid JSON', {
      reason: error instanceof Error ? error.message : String(error),
    });
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new FormatError('JSON notification body must be an object');
  }

  const fields = Object.entries(parsed).map(([key, value]): [string, string] => [key, renderJsonValue(value)]);
  return ParamMap.fromRecord(Object.fromEntries(fields), { keepEmpty: true });
}

function renderJsonValue(value: unknown): string {
  if (isLosslessNumber(value)) {
    return value.value;
  }
  if (typeof value === 'object' && value !== null) {
    return stringifyLossless(value) ?? '';
  }
  return renderParamValue(value);
}
