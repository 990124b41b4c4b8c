export interface MimePart {
  headers: Map<string, string>;
  body: string;
}

const HEADER_BLOCK_END = /\r?\n\r?\n/;

/** True when the buffer starts with a MIME header block announcing a multipart archive. */
export function isMultipartArchive(raw: string): boolean {
  const head = raw.slice(0, 4096);
  const match = HEADER_BLOCK_END.exec(head);
  const headerBlock = match ? head.slice(0, match.index) : head;

  if (/^\s*</.test(headerBlock)) return false;

  const headers = parseHeaders(headerBlock);
  return (headers.get('content-type') ?? '').toLowerCase().startsWith('multipart/');
}

export function parseHeaders(block: string): Map<string, string> {
  const headers = new Map<string, string>();
  // Folded header lines continue with leading whitespace
  const unfolded = block.replace(/\r?\n[ \t]+/g, ' ');

  for (const line of unfolded.split(/\r?\n/)) {
    const separator = line.indexOf(':');
    if (separator <= 0) continue;
    const name = line.slice(0, separator).trim().toLowerCase();
    const value = line.slice(separator + 1).trim();
    if (!headers.has(name)) {
      headers.set(name, value);
    }
  }

  return headers;
}

export function headerParam(value: string, param: string): string | undefined {
  const pattern = new RegExp(`(?:^|;)\\s*${param}\\s*=\\s*(?:"([^"]*)"|([^;\\s]+))`, 'i');
  const match = pattern.exec(value);
  if (!match) return undefined;
  return match[1] ?? match[2];
}

function splitEntity(raw: string): MimePart {
  const match = HEADER_BLOCK_END.exec(raw);
  if (!match) {
    return { headers: parseHeaders(raw), body: '' };
  }
  return {
    headers: parseHeaders(raw.slice(0, match.index)),
    body: raw.slice(match.index + match[0].length),
  };
}

export function splitMultipart(raw: string): MimePart[] {
  const root = splitEntity(raw);
  const contentType = root.headers.get('content-type') ?? '';
  const boundary = headerParam(contentType, 'boundary');

  if (!boundary) {
    throw new Error(`Multipart archive declares no boundary (${contentType || 'no content type'})`);
  }

  const delimiter = `--${boundary}`;
  const sections = root.body.split(delimiter);
  const parts: MimePart[] = [];

  // sections[0] is the preamble; a section starting with "--" is the closing delimiter
  for (const section of sections.slice(1)) {
    if (section.startsWith('--')) break;
    const trimmed = section.replace(/^[ \t]*\r?\n/, '').replace(/\r?\n$/, '');
    if (!trimmed.trim()) continue;
    parts.push(splitEntity(trimmed));
  }

  if (parts.length === 0) {
    throw new Error('Multipart archive contains no parts');
  }

  return parts;
}

export function decodeQuotedPrintable(body: string): Buffer {
  const softBreaksRemoved = body.replace(/=\r?\n/g, '');
  const bytes: number[] = [];

  for (let i = 0; i < softBreaksRemoved.length; i++) {
    const char = softBreaksRemoved[i];
    if (char === '=' && /^[0-9A-Fa-f]{2}$/.test(softBreaksRemoved.slice(i + 1, i + 3))) {
      bytes.push(Number.parseInt(softBreaksRemoved.slice(i + 1, i + 3), 16));
      i += 2;
      continue;
    }
    // Everything else in a quoted-printable body is 7-bit
    bytes.push(softBreaksRemoved.charCodeAt(i) & 0xff);
  }

  return Buffer.from(bytes);
}

export function decodePartBody(part: MimePart): string {
  const encoding = (part.headers.get('content-transfer-encoding') ?? '7bit').toLowerCase();
  const contentType = part.headers.get('content-type') ?? 'text/html';
  const charset = headerParam(contentType, 'charset') ?? 'utf-8';

  let bytes: Buffer;
  switch (encoding) {
    case 'quoted-printable':
      bytes = decodeQuotedPrintable(part.body);
      break;
    case 'base64':
      bytes = Buffer.from(part.body.replace(/\s+/g, ''), 'base64');
      break;
    case '7bit':
    case '8bit':
    case 'binary':
      bytes = Buffer.from(part.body, 'latin1');
      break;
    default:
      throw new Error(`Unsupported transfer encoding "${encoding}"`);
  }

  try {
    return new TextDecoder(charset).decode(bytes);
  } catch {
    throw new Error(`Unsupported charset "${charset}"`);
  }
}

/** Returns the decoded markup of the first text/html part of a multipart web archive. */
export function extractHtmlFromArchive(raw: string): string {
  const parts = splitMultipart(raw);
  const htmlPart = parts.find((part) =>
    (part.headers.get('content-type') ?? '').toLowerCase().startsWith('text/html')
  );

  if (!htmlPart) {
    throw new Error(`Multipart archive has no text/html part (${parts.length} parts)`);
  }

  return decodePartBody(htmlPart);
}
