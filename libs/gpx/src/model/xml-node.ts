export interface XmlAttribute {
  /** Qualified name as it appeared in the source, e.g. `gpxtpx:unit`. */
  name: string;
  localName: string;
  prefix?: string;
  namespace?: string;
  value: string;
}

/**
 * Minimal generic XML fragment. Used for every `<extensions>` block so vendor
 * content survives a read/write cycle without being interpreted.
 *
 * Mixed content keeps its order the way a DOM tail does: `text` is the
 * character data before the first child, and each child's `tail` is the
 * data that follows it up to the next sibling. Both are trimmed and left
 * `undefined` when only whitespace was there.
 */
export interface XmlNode {
  name: string;
  localName: string;
  prefix?: string;
  namespace?: string;
  attributes: XmlAttribute[];
  text?: string;
  tail?: string;
  children: XmlNode[];
}

export function createXmlNode(name: string, namespace?: string): XmlNode {
  const separator = name.indexOf(':');
  const node: XmlNode = {
    name,
    localName: separator === -1 ? name : name.slice(separator + 1),
    attributes: [],
    children: [],
  };

  if (separator !== -1) {
    node.prefix = name.slice(0, separator);
  }
  if (namespace !== undefined) {
    node.namespace = namespace;
  }

  return node;
}
