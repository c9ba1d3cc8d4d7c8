import { Logger } from '@nestjs/common';
import { GpxWriteError } from '../gpx.errors';
import { GpxVersion } from '../gpx-version';
import {
  createGpx,
  createMetadata,
  createTrack,
  createWaypoint,
  type Gpx,
  type Metadata,
} from '../model/gpx.types';
import { createXmlNode } from '../model/xml-node';
import { readGpx } from '../parser/gpx.reader';
import type { XmlSink } from '../xml/xml-sink';
import { writeGpxToString, XmlGpxWriter } from './gpx.writer';

const GPX11_OPEN =
  '<gpx xmlns="http://www.topografix.com/GPX/1/1" xmlns:xsi="http://www.w3.org/2001/XMLSchema-instance" version="1.1"';
const GPX11_SCHEMA =
  'xsi:schemaLocation="http://www.topografix.com/GPX/1/1 http://www.topografix.com/GPX/1/1/gpx.xsd"';
const GPX10_OPEN =
  '<gpx xmlns="http://www.topografix.com/GPX/1/0" xmlns:xsi="http://www.w3.org/2001/XMLSchema-instance" version="1.0"';
const GPX10_SCHEMA =
  'xsi:schemaLocation="http://www.topografix.com/GPX/1/0 http://www.topografix.com/GPX/1/0/gpx.xsd"';

function sampleMetadata(): Metadata {
  const metadata = createMetadata();
  metadata.name = 'Doc';
  metadata.description = 'About';
  metadata.author = { name: 'A', email: 'a@example.com' };
  metadata.links.push({ href: 'u', text: 'U' });
  metadata.time = new Date('2024-01-02T03:04:05Z');
  metadata.keywords = 'k';
  metadata.bounds = { minLat: 1, minLon: 2, maxLat: 3, maxLon: 4 };
  return metadata;
}

const ROUND_TRIP_11 = `<?xml version="1.0" encoding="UTF-8"?>
<gpx version="1.1" creator="test-suite" xmlns="http://www.topografix.com/GPX/1/1" xmlns:x="urn:x">
  <metadata>
    <name> Padded name </name>
    <author><name>Tester</name><email id="tester" domain="example.org"/><link href="https://example.org"/></author>
    <copyright author="Tester"><year>2023</year></copyright>
    <time>2023-06-01T12:00:00.250Z</time>
    <extensions><x:meta x:id="7"/></extensions>
  </metadata>
  <wpt lat="-33.85" lon="151.2">
    <magvar>11.5</magvar>
    <geoidheight>22</geoidheight>
    <name>Harbour &amp; bridge</name>
    <link href="https://example.org/photo.jpg"><text>Photo</text><type>image/jpeg</type></link>
    <type>landmark</type>
    <fix>dgps</fix>
    <hdop>0.9</hdop><vdop>1.1</vdop><pdop>1.4</pdop>
    <ageofdgpsdata>3</ageofdgpsdata>
    <dgpsid>42</dgpsid>
  </wpt>
  <rte><name>R</name><type>walk</type><rtept lat="1" lon="1"/></rte>
  <trk>
    <name>T</name>
    <trkseg>
      <trkpt lat="0.5" lon="0.25"><ele>-1.5</ele><extensions><x:hr>140</x:hr><x:cad unit="rpm">80<x:note>steady</x:note></x:cad></extensions></trkpt>
    </trkseg>
    <extensions><x:color>red</x:color></extensions>
  </trk>
  <extensions><x:doc/></extensions>
</gpx>`;

const ROUND_TRIP_10 = `<?xml version="1.0"?>
<gpx version="1.0" creator="legacy-unit" xmlns="http://www.topografix.com/GPX/1/0">
  <name>Old file</name>
  <author>Someone</author>
  <email>someone@example.com</email>
  <url>https://example.com/old</url>
  <urlname>Old site</urlname>
  <time>2003-01-01T00:00:00Z</time>
  <bounds minlat="1" minlon="2" maxlat="3" maxlon="4"/>
  <wpt lat="1.5" lon="2.5"><course>90</course><speed>4.2</speed><url>https://example.com/w</url><sat>5</sat></wpt>
  <rte><name>R</name><number>3</number><rtept lat="1" lon="2"/></rte>
  <trk><name>T</name><number>1</number><trkseg><trkpt lat="1" lon="2"><time>2003-01-01T00:01:00Z</time></trkpt></trkseg></trk>
</gpx>`;

describe('XmlGpxWriter', () => {
  beforeEach(() => {
    jest.spyOn(Logger.prototype, 'debug').mockImplementation();
    jest.spyOn(Logger.prototype, 'warn').mockImplementation();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('writes a GPX 1.1 document', () => {
    const gpx = createGpx(GpxVersion.Gpx11);
    gpx.creator = 'test-suite';
    const wpt = createWaypoint(46.2, 7.3);
    wpt.elevation = 372.5;
    wpt.name = 'Cafe';
    wpt.time = new Date('2024-05-04T18:00:00Z');
    gpx.waypoints.push(wpt);

    expect(writeGpxToString(gpx)).toBe(
      [
        '<?xml version="1.0" encoding="UTF-8"?>',
        `${GPX11_OPEN} creator="test-suite" ${GPX11_SCHEMA}>`,
        '  <wpt lat="46.2" lon="7.3">',
        '    <ele>372.5</ele>',
        '    <time>2024-05-04T18:00:00Z</time>',
        '    <name>Cafe</name>',
        '  </wpt>',
        '</gpx>',
      ].join('\n'),
    );
  });

  it('uses the configured creator and indent', () => {
    const writer = new XmlGpxWriter({ creator: 'gpxkit', indent: 0 });

    expect(writer.writeToString(createGpx(GpxVersion.Gpx11))).toBe(
      `<?xml version="1.0" encoding="UTF-8"?>${GPX11_OPEN} creator="gpxkit" ${GPX11_SCHEMA}/>`,
    );
  });

  it('prefers the document creator over the configured one', () => {
    const gpx = createGpx(GpxVersion.Gpx11);
    gpx.creator = 'device';

    expect(new XmlGpxWriter({ creator: 'gpxkit', indent: 0 }).writeToString(gpx)).toContain(' creator="device" ');
  });

  it('emits children in canonical order', () => {
    const gpx = createGpx(GpxVersion.Gpx11);
    const track = createTrack();
    track.links.push({ href: 'h', text: 'T' });
    track.description = 'D';
    track.name = 'N';
    gpx.tracks.push(track);

    expect(writeGpxToString(gpx)).toContain(
      [
        '  <trk>',
        '    <name>N</name>',
        '    <desc>D</desc>',
        '    <link href="h">',
        '      <text>T</text>',
        '    </link>',
        '  </trk>',
      ].join('\n'),
    );
  });

  describe('metadata', () => {
    it('writes a metadata element for GPX 1.1', () => {
      const gpx = createGpx(GpxVersion.Gpx11);
      gpx.metadata = sampleMetadata();

      expect(writeGpxToString(gpx)).toBe(
        [
          '<?xml version="1.0" encoding="UTF-8"?>',
          `${GPX11_OPEN} ${GPX11_SCHEMA}>`,
          '  <metadata>',
          '    <name>Doc</name>',
          '    <desc>About</desc>',
          '    <author>',
          '      <name>A</name>',
          '      <email id="a" domain="example.com"/>',
          '    </author>',
          '    <link href="u">',
          '      <text>U</text>',
          '    </link>',
          '    <time>2024-01-02T03:04:05Z</time>',
          '    <keywords>k</keywords>',
          '    <bounds minlat="1" minlon="2" maxlat="3" maxlon="4"/>',
          '  </metadata>',
          '</gpx>',
        ].join('\n'),
      );
    });

    it('writes root-level fields for GPX 1.0', () => {
      const gpx = createGpx(GpxVersion.Gpx11);
      gpx.metadata = sampleMetadata();

      expect(writeGpxToString(gpx, { version: GpxVersion.Gpx10 })).toBe(
        [
          '<?xml version="1.0" encoding="UTF-8"?>',
          `${GPX10_OPEN} ${GPX10_SCHEMA}>`,
          '  <name>Doc</name>',
          '  <desc>About</desc>',
          '  <author>A</author>',
          '  <email>a@example.com</email>',
          '  <url>u</url>',
          '  <urlname>U</urlname>',
          '  <time>2024-01-02T03:04:05Z</time>',
          '  <keywords>k</keywords>',
          '  <bounds minlat="1" minlon="2" maxlat="3" maxlon="4"/>',
          '</gpx>',
        ].join('\n'),
      );
    });
  });

  describe('version narrowing', () => {
    let gpx: Gpx;

    beforeEach(() => {
      gpx = createGpx(GpxVersion.Gpx10);
      const wpt = createWaypoint(1, 2);
      wpt.speed = 4.2;
      wpt.links.push({ href: 'h', text: 'T', type: 'text/html' }, { href: 'h2' });
      gpx.waypoints.push(wpt);
    });

    it('keeps the first link as url/urlname in GPX 1.0', () => {
      expect(writeGpxToString(gpx)).toContain(
        ['  <wpt lat="1" lon="2">', '    <speed>4.2</speed>', '    <url>h</url>', '    <urlname>T</urlname>', '  </wpt>'].join(
          '\n',
        ),
      );
    });

    it('drops 1.0-only fields in GPX 1.1', () => {
      expect(writeGpxToString(gpx, { version: GpxVersion.Gpx11 })).toContain(
        [
          '  <wpt lat="1" lon="2">',
          '    <link href="h">',
          '      <text>T</text>',
          '      <type>text/html</type>',
          '    </link>',
          '    <link href="h2"/>',
          '  </wpt>',
        ].join('\n'),
      );
    });
  });

  describe('extensions', () => {
    it('declares the namespaces a fragment needs', () => {
      const gpx = createGpx(GpxVersion.Gpx11);
      const wpt = createWaypoint(0, 0);
      const extensions = createXmlNode('extensions');
      const power = createXmlNode('power', 'urn:y');
      power.text = '250';
      const plain = createXmlNode('plain');
      plain.text = 'x';
      extensions.children.push(power, plain);
      wpt.extensions = extensions;
      gpx.waypoints.push(wpt);

      expect(writeGpxToString(gpx)).toContain(
        [
          '  <wpt lat="0" lon="0">',
          '    <extensions>',
          '      <power xmlns="urn:y">250</power>',
          '      <plain xmlns="">x</plain>',
          '    </extensions>',
          '  </wpt>',
        ].join('\n'),
      );
    });
  });

  describe('numbers', () => {
    it('spells out values that would otherwise use an exponent', () => {
      const gpx = readGpx(
        '<gpx version="1.1"><wpt lat="0.0000001" lon="-0.00000125"><ele>123456789012345678901234</ele></wpt></gpx>',
      );

      expect(writeGpxToString(gpx)).toContain(
        ['  <wpt lat="0.0000001" lon="-0.00000125">', '    <ele>123456789012345690000000</ele>', '  </wpt>'].join('\n'),
      );
    });

    it('reads the spelled-out values back unchanged', () => {
      const gpx = createGpx(GpxVersion.Gpx11);
      const wpt = createWaypoint(1e-7, 2);
      wpt.elevation = 1.5e22;
      gpx.waypoints.push(wpt);

      expect(readGpx(writeGpxToString(gpx)).waypoints).toEqual([wpt]);
    });
  });

  describe('mixed extension content', () => {
    it('writes text around child elements in document order', () => {
      const gpx = readGpx(
        '<gpx version="1.1"><extensions><a xmlns="urn:a">x<b/>y</a></extensions></gpx>',
      );

      expect(writeGpxToString(gpx)).toContain(
        ['  <extensions>', '    <a xmlns="urn:a">x<b/>y</a>', '  </extensions>'].join('\n'),
      );
    });
  });

  describe('round trip', () => {
    it('reproduces a minimal track document', () => {
      const gpx = readGpx(
        '<gpx version="1.1"><trk><name>Example GPX Document</name><trkseg>' +
          '<trkpt lat="38.82" lon="-121.1"><ele>4.46</ele></trkpt>' +
          '</trkseg></trk></gpx>',
      );

      expect(gpx.tracks).toEqual([
        {
          name: 'Example GPX Document',
          links: [],
          segments: [{ points: [{ lat: 38.82, lon: -121.1, elevation: 4.46, links: [] }] }],
        },
      ]);
      expect(readGpx(writeGpxToString(gpx))).toEqual(gpx);
    });

    it('reads 1.0 speed and leaves it out of 1.1 output', () => {
      const gpx = readGpx(
        '<gpx version="1.0"><wpt lat="1" lon="2"><speed>3.5</speed><name>P</name></wpt></gpx>',
      );

      expect(gpx.waypoints[0].speed).toBe(3.5);
      expect(writeGpxToString(gpx, { version: GpxVersion.Gpx11 })).toContain(
        ['  <wpt lat="1" lon="2">', '    <name>P</name>', '  </wpt>'].join('\n'),
      );
    });

    it('preserves a GPX 1.1 document', () => {
      const original = readGpx(ROUND_TRIP_11);

      expect(readGpx(writeGpxToString(original))).toEqual(original);
    });

    it('preserves a GPX 1.0 document', () => {
      const original = readGpx(ROUND_TRIP_10);

      expect(readGpx(writeGpxToString(original))).toEqual(original);
    });

    it('is stable once written', () => {
      const once = writeGpxToString(readGpx(ROUND_TRIP_11));

      expect(writeGpxToString(readGpx(once))).toBe(once);
    });
  });

  describe('errors', () => {
    it('wraps sink failures', () => {
      const failure = new Error('disk full');
      const sink: XmlSink = {
        write: () => {
          throw failure;
        },
      };

      let caught: unknown;
      try {
        new XmlGpxWriter().write(createGpx(GpxVersion.Gpx11), sink);
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(GpxWriteError);
      expect(caught).toMatchObject({ cause: failure });
    });

    it('rejects an email it cannot split', () => {
      const gpx = createGpx(GpxVersion.Gpx11);
      gpx.metadata = createMetadata();
      gpx.metadata.author = { email: 'not-an-email' };

      expect(() => writeGpxToString(gpx)).toThrow("email 'not-an-email' must contain exactly one '@'");
    });

    it('rejects non-finite numbers', () => {
      const gpx = createGpx(GpxVersion.Gpx11);
      const wpt = createWaypoint(0, 0);
      wpt.elevation = Number.NaN;
      gpx.waypoints.push(wpt);

      expect(() => writeGpxToString(gpx)).toThrow("cannot write non-finite number NaN for 'ele'");
    });
  });
});
