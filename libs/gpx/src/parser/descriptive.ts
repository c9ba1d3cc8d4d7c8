import type { Link } from '../model/gpx.types';
import { legacyLinkBindings, parseLink } from './link.parser';
import type { ElementBinding, TextBinding } from './parse-context';
import { parseNonNegativeInteger } from './scalars';

interface Described {
  name?: string;
  comment?: string;
  description?: string;
  source?: string;
  links: Link[];
  type?: string;
}

/** Text fields common to waypoints, routes and tracks. */
export function descriptiveBindings<T extends Described>(): Record<string, TextBinding<T>> {
  return {
    name: (target, text) => {
      target.name = text;
    },
    cmt: (target, text) => {
      target.comment = text;
    },
    desc: (target, text) => {
      target.description = text;
    },
    src: (target, text) => {
      target.source = text;
    },
    type: (target, text) => {
      target.type = text;
    },
    ...legacyLinkBindings<T>(),
  };
}

export function numberBinding<T extends { number?: number }>(): TextBinding<T> {
  return (target, text, tag) => {
    target.number = parseNonNegativeInteger(tag, text);
  };
}

export function linkBinding<T extends { links: Link[] }>(): ElementBinding<T> {
  return (ctx, start, target) => {
    target.links.push(parseLink(ctx, start));
  };
}
