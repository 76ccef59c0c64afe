import * as sax from 'sax';
import { XMLBuilder } from 'fast-xml-parser';
import type { XmlElement, XmlNode } from './types';

export const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8"?>';

export function element(name: string, attributes: Record<string, string> = {}, children: XmlNode[] = []): XmlElement {
  return { kind: 'element', name, attributes, children };
}

export function text(value: string): XmlNode {
  return { kind: 'text', text: value };
}

export function attr(el: XmlElement, name: string): string | undefined {
  return Object.prototype.hasOwnProperty.call(el.attributes, name) ? el.attributes[name] : undefined;
}

function attributeValue(v: string | sax.QualifiedAttribute): string {
  return typeof v === 'string' ? v : v.value;
}

export interface RecordReader {
  write(chunk: string): void;
  /** Ends the document. Throws when it was malformed or had no root. */
  close(): void;
}

function isBlank(node: XmlNode): boolean {
  return node.kind === 'text' && node.text.trim() === '';
}

/**
 * Incremental reader for the direct children of the document root whose tag
 * is in `wanted`. Each one is handed to `onRecord`, in document order, once
 * its closing tag is read. Everything else is skipped without being
 * materialised. Text is kept as written; whitespace-only runs between
 * elements are dropped. `write` throws on malformed XML.
 */
export function createRecordReader(wanted: ReadonlySet<string>, onRecord: (record: XmlElement) => void): RecordReader {
  const parser = sax.parser(true);
  // open elements below the root that are being captured
  const stack: XmlElement[] = [];
  let depth = 0;
  let sawRoot = false;

  const appendText = (t: string) => {
    const cur = stack[stack.length - 1];
    if (!cur || !t) return;
    const last = cur.children[cur.children.length - 1];
    if (last && last.kind === 'text') last.text += t;
    else cur.children.push(text(t));
  };

  parser.onerror = (err: Error) => {
    throw err;
  };

  parser.onopentag = (node: sax.Tag | sax.QualifiedTag) => {
    depth++;
    sawRoot = true;
    const capturing = stack.length > 0;
    if (!capturing && !(depth === 2 && wanted.has(node.name))) return;
    const attributes: Record<string, string> = {};
    for (const [k, v] of Object.entries(node.attributes)) attributes[k] = attributeValue(v);
    const el = element(node.name, attributes);
    if (capturing) stack[stack.length - 1].children.push(el);
    stack.push(el);
  };

  parser.ontext = appendText;
  parser.oncdata = appendText;

  parser.onclosetag = () => {
    depth--;
    const el = stack.pop();
    if (!el) return;
    el.children = el.children.filter(c => !isBlank(c));
    if (stack.length === 0) onRecord(el);
  };

  return {
    write(chunk: string) {
      parser.write(chunk);
    },
    close() {
      parser.close();
      if (!sawRoot) throw new Error('No root element');
    },
  };
}

/** Reads every wanted record of a complete document. Throws on malformed XML. */
export function readTopLevelElements(xml: string, wanted: ReadonlySet<string>): XmlElement[] {
  const found: XmlElement[] = [];
  const reader = createRecordReader(wanted, el => found.push(el));
  reader.write(xml);
  reader.close();
  return found;
}

type OrderedNode = { [tag: string]: OrderedNode[] | string | Record<string, string> };

const ATTR_PREFIX = '@_';

function toOrdered(node: XmlNode): OrderedNode {
  if (node.kind === 'text') return { '#text': node.text };
  const out: OrderedNode = { [node.name]: node.children.map(toOrdered) };
  const names = Object.keys(node.attributes);
  if (names.length) {
    const attrs: Record<string, string> = {};
    for (const n of names) attrs[ATTR_PREFIX + n] = node.attributes[n];
    out[':@'] = attrs;
  }
  return out;
}

/** Serializes `root` with an XML declaration, one element per line. */
export function serializeXml(root: XmlElement, indent: string = '    '): string {
  const builder = new XMLBuilder({
    preserveOrder: true,
    ignoreAttributes: false,
    attributeNamePrefix: ATTR_PREFIX,
    textNodeName: '#text',
    format: indent.length > 0,
    indentBy: indent,
    suppressEmptyNode: true,
  });
  const body: string = builder.build([toOrdered(root)]);
  return `${XML_DECLARATION}\n${body.trim()}\n`;
}
