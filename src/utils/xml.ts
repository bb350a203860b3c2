import xml2js from 'xml2js';

function findText(node: unknown, tag: string): string | undefined {
  if (node === null || typeof node !== 'object') {
    return undefined;
  }
  for (const [key, value] of Object.entries(node)) {
    if (key === tag && typeof value === 'string') {
      return value;
    }
    const nested = findText(value, tag);
    if (nested !== undefined) {
      return nested;
    }
  }
  return undefined;
}

/**
 * Pull the text of the first `<tag>` element out of an XML document, e.g. the
 * `<Message>` of an S3 error body. Returns undefined when the body is not XML
 * or has no such element.
 */
export async function getXmlText(body: string, tag = 'Message'): Promise<string | undefined> {
  if (!body.trimStart().startsWith('<')) {
    return undefined;
  }
  const parser = new xml2js.Parser({ explicitArray: false, trim: true });
  try {
    const parsed: unknown = await parser.parseStringPromise(body);
    return findText(parsed, tag);
  } catch {
    return undefined;
  }
}
