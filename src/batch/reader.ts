import { Headers, Response } from 'undici';
import { BatchResponseError } from '../error/batchResponseError.js';
import { type SafeWrap, safeWrap } from '../utils/wrap.js';

/** Statuses whose responses must not carry a body. */
const NULL_BODY_STATUSES: ReadonlySet<number> = new Set([204, 205, 304]);

const STATUS_LINE = /^HTTP\/\d(?:\.\d)?\s+(\d{3})(?:\s+(.*))?$/;

/** One sub-response, with the `Content-ID` it was labelled with, if any. */
export interface SubResponse {
  contentId: string | null;
  result: SafeWrap<BatchResponseError, Response>;
}

/** A top-level part of the batch response. */
export type ResponseSegment =
  | { type: 'single'; response: SubResponse }
  | { type: 'changeset'; responses: SubResponse[] };

interface Entity {
  headers: Map<string, string>;
  body: string;
}

/**
 * Reads the `boundary` parameter of a multipart content type.
 */
export function getBoundary(contentType: string | null): string | null {
  if (!contentType || !/^\s*multipart\//i.test(contentType)) {
    return null;
  }

  const match = /;\s*boundary=(?:"([^"]+)"|([^;\s]+))/i.exec(contentType);
  return match?.[1] ?? match?.[2] ?? null;
}

/**
 * Splits a multipart body into the raw text of its parts; preamble and
 * epilogue are dropped.
 */
export function splitMultipart(body: string, boundary: string): string[] {
  const sections = body.split(`--${boundary}`);
  const parts: string[] = [];

  for (const section of sections.slice(1)) {
    if (section.startsWith('--')) {
      break;
    }
    parts.push(section.replace(/^[ \t]*\r?\n/, '').replace(/\r?\n$/, ''));
  }

  return parts;
}

/** Splits a message at its first blank line into head lines and body. */
function splitHead(text: string): { head: string[]; body: string } {
  const separator = /\r?\n\r?\n/.exec(text);
  if (!separator) {
    return { head: text.split(/\r?\n/), body: '' };
  }

  return {
    head: text.slice(0, separator.index).split(/\r?\n/),
    body: text.slice(separator.index + separator[0].length),
  };
}

function parseHeaders(lines: readonly string[]): Map<string, string> {
  const headers = new Map<string, string>();

  for (const line of lines) {
    const colon = line.indexOf(':');
    if (colon > 0) {
      headers.set(line.slice(0, colon).trim().toLowerCase(), line.slice(colon + 1).trim());
    }
  }

  return headers;
}

function parseEntity(text: string): Entity {
  const { head, body } = splitHead(text);
  return { headers: parseHeaders(head), body };
}

/**
 * Parses an embedded `application/http` response message.
 * A bad status line, or a status outside 200-599, is an error.
 */
export function parseHttpMessage(text: string): SafeWrap<BatchResponseError, Response> {
  const { head, body } = splitHead(text);
  const [statusLine = '', ...headerLines] = head;
  const match = STATUS_LINE.exec(statusLine.trim());
  if (!match) {
    return [new BatchResponseError('error parsing sub-response status line', text), null];
  }

  const status = Number(match[1]);
  if (status < 200 || status > 599) {
    return [new BatchResponseError(`error unsupported sub-response status ${status}`, text), null];
  }

  const [err, response] = safeWrap(() => {
    const headers = new Headers();
    for (const [key, value] of parseHeaders(headerLines)) {
      headers.append(key, value);
    }

    return new Response(NULL_BODY_STATUSES.has(status) ? null : body, {
      status,
      statusText: match[2]?.trim() ?? '',
      headers,
    });
  });
  if (err) {
    return [new BatchResponseError('error building sub-response', text, { cause: err }), null];
  }

  return [null, response];
}

function readSubResponse(entity: Entity): SubResponse {
  return { contentId: entity.headers.get('content-id') ?? null, result: parseHttpMessage(entity.body) };
}

/**
 * Reads a physical batch response body into segments, in body order.
 *
 * @param contentType - `Content-Type` of the physical response.
 * @returns An error when the body is not multipart at all.
 */
export function readBatch(contentType: string | null, body: string): SafeWrap<BatchResponseError, ResponseSegment[]> {
  const boundary = getBoundary(contentType);
  if (!boundary) {
    return [new BatchResponseError(`error batch response is not multipart: ${contentType ?? 'no content type'}`, body), null];
  }

  const segments: ResponseSegment[] = [];
  for (const part of splitMultipart(body, boundary)) {
    const entity = parseEntity(part);
    const nested = getBoundary(entity.headers.get('content-type') ?? null);

    if (!nested) {
      segments.push({ type: 'single', response: readSubResponse(entity) });
      continue;
    }

    segments.push({
      type: 'changeset',
      responses: splitMultipart(entity.body, nested).map((inner) => readSubResponse(parseEntity(inner))),
    });
  }

  return [null, segments];
}
