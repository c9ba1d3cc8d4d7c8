import { GpxWriteError } from '../gpx.errors';
import type { Person } from '../model/gpx.types';
import { writeLink } from './link.writer';
import { writeChildren, writeText, type ElementWriter, type WriteContext } from './write-context';

function writeEmail(ctx: WriteContext, tag: string, email: string): void {
  const parts = email.split('@');
  if (parts.length !== 2) {
    throw new GpxWriteError(`email '${email}' must contain exactly one '@'`);
  }
  const [id, domain] = parts;
  ctx.emitter.emptyElement(tag, [
    ['id', id],
    ['domain', domain],
  ]);
}

export const personWriter: ElementWriter<Person> = {
  element: 'person',
  fields: {
    name: (ctx, person, tag) => writeText(ctx, tag, person.name),
    email: (ctx, person, tag) => {
      if (person.email !== undefined) {
        writeEmail(ctx, tag, person.email);
      }
    },
    link: (ctx, person) => {
      if (person.link) {
        writeLink(ctx, person.link);
      }
    },
  },
};

export function writePerson(ctx: WriteContext, tag: string, person: Person): void {
  ctx.emitter.startElement(tag);
  writeChildren(ctx, personWriter, person);
  ctx.emitter.endElement();
}
