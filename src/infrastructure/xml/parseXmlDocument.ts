/**
 * XML → element tree (SAX)
 * Layer: Infrastructure
 *
 * Export responses are one page at a time, so a small in-memory tree is fine.
 * The strict SAX parser fills it event by event: opentag pushes onto the
 * element stack, text/cdata accumulate on the current element, closetag pops
 * and attaches the element to its parent. Malformed documents throw.
 */
import type { XmlElement } from '@domain/interfaces/IResponseShapeAdapter';
import sax from 'sax';

export function parseXmlDocument(xml: string): XmlElement {
  const parser = sax.parser(true, { trim: false });
  const stack: XmlElement[] = [];
  const tree: { root?: XmlElement } = {};

  parser.onopentag = (node) => {
    const attributes: Record<string, string> = {};
    for (const [key, value] of Object.entries(node.attributes)) {
      attributes[key] = typeof value === 'string' ? value : value.value;
    }
    stack.push({ name: node.name, attributes, children: [], text: '' });
  };

  const appendText = (text: string) => {
    const current = stack[stack.length - 1];
    if (current) current.text += text;
  };
  parser.ontext = appendText;
  parser.oncdata = appendText;

  parser.onclosetag = () => {
    const element = stack.pop();
    if (!element) return;
    element.text = element.text.trim();
    const parent = stack[stack.length - 1];
    if (parent) {
      parent.children.push(element);
    } else {
      tree.root = element;
    }
  };

  parser.onerror = (err) => {
    throw err;
  };

  parser.write(xml).close();

  if (!tree.root) {
    throw new Error('XML document has no root element');
  }
  return tree.root;
}
