import { GpxVersion } from '../gpx-version';
import { createLink, type Link } from '../model/gpx.types';
import type { StartElement } from '../xml/xml-event';
import {
  consumeChildren,
  requireAttribute,
  type ElementParser,
  type ParseContext,
  type TextBinding,
} from './parse-context';

export const linkParser: ElementParser<Link> = {
  element: 'link',
  text: {
    text: (link, text) => {
      link.text = text;
    },
    type: (link, text) => {
      link.type = text;
    },
  },
  children: {},
};

export function parseLink(ctx: ParseContext, start: StartElement): Link {
  return consumeChildren(ctx, start, linkParser, createLink(requireAttribute(start, 'href')));
}

interface Linked {
  links: Link[];
}

// GPX 1.0 has a single url/urlname pair per element; it maps onto links[0].
function legacyLink(target: Linked): Link {
  if (target.links.length === 0) {
    target.links.push(createLink(''));
  }
  return target.links[0];
}

export function legacyLinkBindings<T extends Linked>(): Record<string, TextBinding<T>> {
  return {
    url: (target, text) => {
      legacyLink(target).href = text;
    },
    urlname: (target, text) => {
      legacyLink(target).text = text;
    },
  };
}

/** Drops a GPX 1.0 link that got a `urlname` but never a `url`. */
export function dropIncompleteLegacyLink(ctx: ParseContext, target: Linked, start: StartElement): void {
  if (ctx.version !== GpxVersion.Gpx10) return;

  const first = target.links[0];
  if (first && first.href === '') {
    target.links.shift();
    ctx.logger.warn(`Dropping <urlname> without <url> in <${start.name.local}>`);
  }
}
