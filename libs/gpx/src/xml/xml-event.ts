import type { XmlAttribute } from '../model/xml-node';

export interface QualifiedName {
  /** Name as written in the source, prefix included. */
  qualified: string;
  local: string;
  prefix?: string;
  namespace?: string;
}

export interface StartElement {
  type: 'start';
  name: QualifiedName;
  attributes: XmlAttribute[];
}

export interface EndElement {
  type: 'end';
  name: QualifiedName;
}

export interface TextEvent {
  type: 'text';
  text: string;
}

export interface CDataEvent {
  type: 'cdata';
  text: string;
}

export type XmlEvent = StartElement | EndElement | TextEvent | CDataEvent;

export function attributeValue(start: StartElement, localName: string): string | undefined {
  return start.attributes.find((attr) => attr.localName === localName && !attr.namespace)?.value;
}
