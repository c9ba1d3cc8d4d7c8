import { createRoute, type Route } from '../model/gpx.types';
import type { StartElement } from '../xml/xml-event';
import { descriptiveBindings, linkBinding, numberBinding } from './descriptive';
import { dropIncompleteLegacyLink } from './link.parser';
import { consumeChildren, type ElementParser, type ParseContext } from './parse-context';
import { parseWaypoint } from './waypoint.parser';

export const routeParser: ElementParser<Route> = {
  element: 'route',
  text: {
    ...descriptiveBindings<Route>(),
    number: numberBinding<Route>(),
  },
  children: {
    link: linkBinding<Route>(),
    rtept: (ctx, start, route) => {
      route.points.push(parseWaypoint(ctx, start));
    },
  },
  extensions: (route, extensions) => {
    route.extensions = extensions;
  },
  finish: dropIncompleteLegacyLink,
};

export function parseRoute(ctx: ParseContext, start: StartElement): Route {
  return consumeChildren(ctx, start, routeParser, createRoute());
}
