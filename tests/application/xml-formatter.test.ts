import { describe, it, expect } from 'vitest';
import { formatXmlEvent, formatXmlEvents } from '../../src/application/xml-formatter.js';
import { createEvent } from '../../src/application/event-schema.js';
import { makeEvent } from '../helpers.js';

const BODY =
  '<time>1372274622.493</time><index>main</index><host>localhost</host>'
  + '<source>Splunk</source><sourcetype>misc</sourcetype>';

describe('formatXmlEvents', () => {
  it('serializes a single complete event into one stream', () => {
    expect(formatXmlEvents([makeEvent()])).toEqual([
      '<stream><event stanza="test_scheme://test">' + BODY
        + '<data>This is a test data3.</data></event></stream>',
    ]);
  });

  it('marks fragments with unbroken="1" and closes with <done />', () => {
    const first = makeEvent({ data: 'This is a test data1.', unbroken: true });
    const last = makeEvent({ data: 'This is a test data2.', unbroken: true, done: true });

    expect(formatXmlEvents([first, last])).toEqual([
      '<stream>'
        + '<event stanza="test_scheme://test" unbroken="1">' + BODY
        + '<data>This is a test data1.</data></event>'
        + '<event stanza="test_scheme://test" unbroken="1">' + BODY
        + '<data>This is a test data2.</data><done /></event>'
        + '</stream>',
    ]);
  });

  it('never emits unbroken="0"', () => {
    const xml = formatXmlEvent(makeEvent({ done: true }));
    expect(xml.startsWith('<event stanza="test_scheme://test">')).toBe(true);
    expect(xml.endsWith('<data>This is a test data3.</data><done /></event>')).toBe(true);
  });

  it('keeps non-ASCII characters intact', () => {
    const [stream] = formatXmlEvents([makeEvent({ data: 'This is utf-8 ☃ data4.' })]);
    expect(stream).toBe(
      '<stream><event stanza="test_scheme://test">' + BODY
        + '<data>This is utf-8 ☃ data4.</data></event></stream>',
    );
  });

  it('escapes markup characters in text and keeps newlines literal', () => {
    const event = createEvent({ data: 'a < b && c > d\nnext "line"', time: 5, stanza: 's' });
    expect(formatXmlEvent(event)).toBe(
      '<event stanza="s"><time>5</time>'
        + '<data>a &lt; b &amp;&amp; c &gt; d\nnext "line"</data></event>',
    );
  });

  it('escapes quotes and newlines in the stanza attribute', () => {
    const event = createEvent({ data: 'x', time: 1, stanza: 'in"put\n&1' });
    expect(formatXmlEvent(event)).toBe(
      '<event stanza="in&quot;put&#10;&amp;1"><time>1</time><data>x</data></event>',
    );
  });

  it('omits empty fields and renders a missing stanza as empty', () => {
    const event = createEvent({ data: '', time: 7, host: '', index: 'main' });
    expect(formatXmlEvent(event)).toBe('<event stanza=""><time>7</time><index>main</index></event>');
  });

  it('starts a new stream when the stanza changes', () => {
    const events = [
      makeEvent({ data: 'a', stanza: 'one://x' }),
      makeEvent({ data: 'b', stanza: 'one://x' }),
      makeEvent({ data: 'c', stanza: 'two://y' }),
      makeEvent({ data: 'd', stanza: 'one://x' }),
    ];
    const streams = formatXmlEvents(events);
    expect(streams).toHaveLength(3);
    expect(streams[0]?.match(/<event /g)).toHaveLength(2);
    expect(streams[1]).toContain('<data>c</data>');
    expect(streams[2]).toContain('<data>d</data>');
  });

  it('chunks streams by maxEventsPerStream in input order', () => {
    const events = ['a', 'b', 'c', 'd', 'e'].map((data) => makeEvent({ data }));
    const streams = formatXmlEvents(events, { maxEventsPerStream: 2 });
    expect(streams).toHaveLength(3);
    const order = streams.flatMap((s) => [...s.matchAll(/<data>(\w)<\/data>/g)].map((m) => m[1]));
    expect(order).toEqual(['a', 'b', 'c', 'd', 'e']);
  });

  it('renders a zero timestamp rather than dropping it', () => {
    const event = createEvent({ data: 'x', time: 0, stanza: 's' });
    expect(formatXmlEvent(event)).toBe('<event stanza="s"><time>0</time><data>x</data></event>');
  });

  it('returns no streams for no events', () => {
    expect(formatXmlEvents([])).toEqual([]);
  });

  it('rejects a non-positive cap', () => {
    expect(() => formatXmlEvents([makeEvent()], { maxEventsPerStream: 0 })).toThrow(RangeError);
  });
});
