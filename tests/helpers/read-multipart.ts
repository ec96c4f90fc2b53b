// Minimal multipart/mixed batch reader, only good enough to check what the writer produced.

export type ParsedOperation = {
  changeset?: string;
  method?: string;
  uri?: string;
  status?: number;
  contentId?: string;
  headers: [string, string][];
  body: string;
};

const CRLF = '\r\n';

function splitParts(payload: string, boundary: string): string[] {
  const pieces = payload.split(`--${boundary}`);
  return pieces.slice(1, -1).map((piece) => {
    let part = piece.startsWith(CRLF) ? piece.slice(CRLF.length) : piece;
    if (part.endsWith(CRLF)) part = part.slice(0, -CRLF.length);
    return part;
  });
}

function splitHead(text: string): { lines: string[]; rest: string } {
  const end = text.indexOf(`${CRLF}${CRLF}`);
  if (end === -1) return { lines: text ? text.split(CRLF) : [], rest: '' };
  return { lines: text.slice(0, end).split(CRLF), rest: text.slice(end + 2 * CRLF.length) };
}

function parseHeader(line: string): [string, string] {
  const colon = line.indexOf(':');
  return [line.slice(0, colon), line.slice(colon + 1).trim()];
}

function parseOperation(content: string, changeset?: string): ParsedOperation {
  const { lines, rest } = splitHead(content);
  const [startLine = '', ...headerLines] = lines;
  const operation: ParsedOperation = { changeset, headers: [], body: rest };

  const status = /^HTTP\/1\.1 (\d{3}) /.exec(startLine);
  if (status?.[1]) {
    operation.status = Number(status[1]);
  } else {
    const [method, uri] = startLine.split(' ');
    operation.method = method;
    operation.uri = uri;
  }

  for (const line of headerLines) {
    const [name, value] = parseHeader(line);
    if (name.toLowerCase() === 'content-id') {
      operation.contentId = value;
    } else {
      operation.headers.push([name, value]);
    }
  }
  return operation;
}

export function readMultipartBatch(payload: string, boundary: string, changeset?: string): ParsedOperation[] {
  const operations: ParsedOperation[] = [];
  for (const part of splitParts(payload, boundary)) {
    const { lines, rest } = splitHead(part);
    const contentType = lines.map(parseHeader).find(([name]) => name.toLowerCase() === 'content-type')?.[1] ?? '';
    const nested = /^multipart\/mixed; boundary=(.+)$/.exec(contentType)?.[1];
    if (nested) {
      operations.push(...readMultipartBatch(rest, nested, nested));
    } else {
      operations.push(parseOperation(rest, changeset));
    }
  }
  return operations;
}
