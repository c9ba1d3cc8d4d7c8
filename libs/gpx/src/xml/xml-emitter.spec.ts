import { GpxWriteError } from '../gpx.errors';
import { escapeXml, XmlEmitter } from './xml-emitter';
import { StringSink, type XmlSink } from './xml-sink';

describe('XmlEmitter', () => {
  it('indents nested elements and collapses empty ones', () => {
    const sink = new StringSink();
    const emitter = new XmlEmitter(sink);

    emitter.declaration();
    emitter.startElement('gpx', [['version', '1.1']], { '': 'urn:gpx' });
    emitter.textElement('name', 'A & B');
    emitter.emptyElement('bounds', [['minlat', '1']]);
    emitter.endElement();

    expect(sink.toString()).toBe(
      [
        '<?xml version="1.0" encoding="UTF-8"?>',
        '<gpx xmlns="urn:gpx" version="1.1">',
        '  <name>A &amp; B</name>',
        '  <bounds minlat="1"/>',
        '</gpx>',
      ].join('\n'),
    );
  });

  it('writes everything on one line when indent is 0', () => {
    const sink = new StringSink();
    const emitter = new XmlEmitter(sink, { indent: 0 });

    emitter.startElement('a');
    emitter.textElement('b', 'x');
    emitter.startElement('c');
    emitter.textElement('d', 'y');
    emitter.endElement();
    emitter.endElement();

    expect(sink.toString()).toBe('<a><b>x</b><c><d>y</d></c></a>');
  });

  it('does not indent children inside mixed content', () => {
    const sink = new StringSink();
    const emitter = new XmlEmitter(sink);

    emitter.startElement('a');
    emitter.startElement('m');
    emitter.text('x');
    emitter.emptyElement('b');
    emitter.text('y');
    emitter.endElement();
    emitter.endElement();

    expect(sink.toString()).toBe(['<a>', '  <m>x<b/>y</m>', '</a>'].join('\n'));
  });

  it('keeps an empty text element distinct from a missing one', () => {
    const sink = new StringSink();
    new XmlEmitter(sink).textElement('name', '');

    expect(sink.toString()).toBe('<name></name>');
  });

  it('escapes attribute values', () => {
    const sink = new StringSink();
    new XmlEmitter(sink).emptyElement('link', [['href', 'http://example.com/?a=1&b="2"']]);

    expect(sink.toString()).toBe('<link href="http://example.com/?a=1&amp;b=&quot;2&quot;"/>');
  });

  it('tracks namespace declarations through nested scopes', () => {
    const emitter = new XmlEmitter(new StringSink());

    emitter.startElement('gpx', [], { '': 'urn:gpx', xsi: 'urn:xsi' });
    emitter.startElement('ext:data', [], { ext: 'urn:ext' });

    expect(emitter.lookupNamespace('ext')).toBe('urn:ext');
    expect(emitter.lookupNamespace('')).toBe('urn:gpx');

    emitter.endElement();

    expect(emitter.lookupNamespace('ext')).toBeUndefined();
    expect(emitter.lookupNamespace('xsi')).toBe('urn:xsi');
  });

  it('wraps sink failures in GpxWriteError', () => {
    const failure = new Error('disk full');
    const sink: XmlSink = {
      write: () => {
        throw failure;
      },
    };

    let caught: unknown;
    try {
      new XmlEmitter(sink).declaration();
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(GpxWriteError);
    expect(caught).toMatchObject({ message: 'failed to write GPX output', cause: failure });
  });

  it('refuses to close an element that was never opened', () => {
    expect(() => new XmlEmitter(new StringSink()).endElement()).toThrow(GpxWriteError);
  });

  it('refuses text outside of an element', () => {
    expect(() => new XmlEmitter(new StringSink()).text('loose')).toThrow('cannot write text outside of an element');
  });
});

describe('escapeXml', () => {
  it('escapes markup characters', () => {
    expect(escapeXml('<a href="x">&</a>')).toBe('&lt;a href=&quot;x&quot;&gt;&amp;&lt;/a&gt;');
  });
});
