import type { OutgoingRequest } from '../types/request.js';

const CRLF = '\r\n';

/** One queued sub-request with its correlation token. */
export interface BatchPart {
  token: string;
  request: OutgoingRequest;
}

/**
 * A top-level part of the batch body: a lone retrieval, or a change set of
 * consecutive mutations.
 */
export type BatchSegment =
  | { type: 'single'; part: BatchPart }
  | { type: 'changeset'; boundary: string; parts: BatchPart[] };

/**
 * Groups parts in add order. Consecutive mutations share one change set;
 * a GET closes the current one.
 *
 * @param createBoundary - Called once per change set.
 */
export function planSegments(parts: readonly BatchPart[], createBoundary: () => string): BatchSegment[] {
  const segments: BatchSegment[] = [];
  let changeset: BatchPart[] | null = null;

  for (const part of parts) {
    if (part.request.method === 'GET') {
      segments.push({ type: 'single', part });
      changeset = null;
      continue;
    }

    if (!changeset) {
      changeset = [];
      segments.push({ type: 'changeset', boundary: createBoundary(), parts: changeset });
    }
    changeset.push(part);
  }

  return segments;
}

function partLines({ token, request }: BatchPart): string[] {
  const lines = [
    'Content-Type: application/http',
    'Content-Transfer-Encoding: binary',
    `Content-ID: ${token}`,
    '',
    `${request.method} ${request.url.href} HTTP/1.1`,
  ];

  for (const [key, value] of request.headers) {
    lines.push(`${key}: ${value}`);
  }
  lines.push('', request.body ?? '');

  return lines;
}

/**
 * Serializes segments into a `multipart/mixed` body delimited by `boundary`.
 */
export function serializeBatch(segments: readonly BatchSegment[], boundary: string): string {
  const lines: string[] = [];

  for (const segment of segments) {
    lines.push(`--${boundary}`);

    if (segment.type === 'single') {
      lines.push(...partLines(segment.part));
      continue;
    }

    lines.push(`Content-Type: multipart/mixed; boundary=${segment.boundary}`, '');
    for (const part of segment.parts) {
      lines.push(`--${segment.boundary}`, ...partLines(part));
    }
    lines.push(`--${segment.boundary}--`);
  }
  lines.push(`--${boundary}--`, '');

  return lines.join(CRLF);
}
