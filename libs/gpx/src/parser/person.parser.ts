import type { Person } from '../model/gpx.types';
import type { StartElement } from '../xml/xml-event';
import { parseLink } from './link.parser';
import { consumeChildren, requireAttribute, type ElementParser, type ParseContext } from './parse-context';

const emailParser: ElementParser<{ address: string }> = {
  element: 'email',
  text: {},
  children: {},
};

export function parseEmail(ctx: ParseContext, start: StartElement): string {
  const id = requireAttribute(start, 'id');
  const domain = requireAttribute(start, 'domain');
  return consumeChildren(ctx, start, emailParser, { address: `${id}@${domain}` }).address;
}

export const personParser: ElementParser<Person> = {
  element: 'person',
  text: {
    name: (person, text) => {
      person.name = text;
    },
  },
  children: {
    email: (ctx, start, person) => {
      person.email = parseEmail(ctx, start);
    },
    link: (ctx, start, person) => {
      person.link = parseLink(ctx, start);
    },
  },
};

export function parsePerson(ctx: ParseContext, start: StartElement): Person {
  return consumeChildren(ctx, start, personParser, {});
}
