/**
 * Builds multipart/form-data payloads for app.inject().
 */

export interface MultipartPart {
  name: string;
  filename?: string;
  contentType?: string;
  data: Buffer | string;
}

export interface MultipartPayload {
  headers: Record<string, string>;
  payload: Buffer;
}

const BOUNDARY = '----RecipeApiTestBoundary7MA4YWxkTrZu0gW';

export function buildMultipart(parts: MultipartPart[]): MultipartPayload {
  const chunks: Buffer[] = [];
  for (const part of parts) {
    const disposition = part.filename
      ? `form-data; name="${part.name}"; filename="${part.filename}"`
      : `form-data; name="${part.name}"`;
    const headerLines = [`--${BOUNDARY}`, `Content-Disposition: ${disposition}`];
    if (part.contentType) headerLines.push(`Content-Type: ${part.contentType}`);
    chunks.push(Buffer.from(`${headerLines.join('\r\n')}\r\n\r\n`));
    chunks.push(typeof part.data === 'string' ? Buffer.from(part.data) : part.data);
    chunks.push(Buffer.from('\r\n'));
  }
  chunks.push(Buffer.from(`--${BOUNDARY}--\r\n`));

  return {
    headers: { 'content-type': `multipart/form-data; boundary=${BOUNDARY}` },
    payload: Buffer.concat(chunks),
  };
}

/** A valid 1x1 PNG */
export const TINY_PNG = Buffer.from(
  'iVBORw0KGgoAAAANSUhEUgAAAAEAAAABCAQAAAC1HAwCAAAAC0lEQVR42mNkYAAAAAYAAjCB0C8AAAAASUVORK5CYII=',
  'base64',
);
