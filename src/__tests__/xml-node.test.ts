import { describe, it, expect } from 'vitest';
import { XmlNode } from '../core/xml-node';
import { Ls3SchemaError } from '../errors';
import { formatColor, formatFloat, parseColor, setXYZ, setXYZW } from '../utils/xml-formatter';

describe('XmlNode', () => {
  it('serializes attributes in insertion order and self-closes empty elements', () => {
    const root = new XmlNode('Zusi');
    root.appendChild('Info').setAttribute('DateiTyp', 'Landschaft').setAttribute('Version', 'A.1');
    root.appendChild('Landschaft');

    expect([...root.serializeLines()]).toEqual([
      '<Zusi>',
      '  <Info DateiTyp="Landschaft" Version="A.1"/>',
      '  <Landschaft/>',
      '</Zusi>',
    ]);
  });

  it('keeps the position of an attribute that is set again', () => {
    const node = new XmlNode('p').setAttribute('X', 1).setAttribute('Y', 2).setAttribute('X', 3);
    expect([...node.serializeLines()]).toEqual(['<p X="3" Y="2"/>']);
  });

  it('escapes attribute values', () => {
    const node = new XmlNode('Datei').setAttribute('Dateiname', 'a<b & "c">');
    expect([...node.serializeLines()]).toEqual(['<Datei Dateiname="a&lt;b &amp; &quot;c&quot;&gt;"/>']);
  });

  it('writes a byte order mark, the declaration and a separator after every line', () => {
    const text = new XmlNode('Zusi').serializeDocument('\r\n');
    expect(text).toBe('\uFEFF<?xml version="1.0" encoding="UTF-8"?>\r\n<Zusi/>\r\n');
  });

  it('parses a serialized document back', () => {
    const root = new XmlNode('Zusi');
    const subset = root.appendChild('Landschaft').appendChild('SubSet').setAttribute('MeshV', 3);
    subset.appendChild('Textur').appendChild('Datei').setAttribute('Dateiname', 'a & b.dds');

    const parsed = XmlNode.parse(root.serializeDocument('\n'));
    const parsedSubset = parsed.findChild('Landschaft')?.findChild('SubSet');

    expect(parsed.name).toBe('Zusi');
    expect(parsedSubset?.getNumber('MeshV')).toBe(3);
    expect(parsedSubset?.findChild('Textur')?.findChild('Datei')?.getAttribute('Dateiname')).toBe('a & b.dds');
  });

  it('keeps sibling order when parsing', () => {
    const parsed = XmlNode.parse('<Zusi><A/><B/><A n="2"/></Zusi>');
    expect(parsed.getChildren().map(child => child.name)).toEqual(['A', 'B', 'A']);
    expect(parsed.findChildren('A')[1].getAttribute('n')).toBe('2');
  });

  it('falls back for missing or unparsable numbers', () => {
    const node = new XmlNode('p').setAttribute('X', 'abc').setAttribute('Y', ' ');
    expect(node.getNumber('X', 7)).toBe(7);
    expect(node.getNumber('Y')).toBe(0);
    expect(node.getNumber('Z', -1)).toBe(-1);
  });

  it('rejects invalid element names', () => {
    expect(() => new XmlNode('1abc')).toThrow(Ls3SchemaError);
  });

  it('rejects a document without a root element', () => {
    expect(() => XmlNode.parse('<?xml version="1.0"?>')).toThrow(Ls3SchemaError);
  });
});

describe('xml formatting', () => {
  it('formats floats with at most seven decimals', () => {
    expect(formatFloat(0.1 + 0.2)).toBe('0.3');
    expect(formatFloat(100)).toBe('100');
    expect(formatFloat(-2.5)).toBe('-2.5');
    expect(formatFloat(-1e-9)).toBe('0');
    expect(formatFloat(Number.NaN)).toBe('0');
  });

  it('leaves out zero vector components', () => {
    const node = setXYZ(new XmlNode('p'), [0, 1.5, 1e-9]);
    expect([...node.serializeLines()]).toEqual(['<p Y="1.5"/>']);
  });

  it('leaves out quaternion components below the epsilon', () => {
    const node = setXYZW(new XmlNode('q'), [0.00001, 0, 0.5, -0.5], 1e-4);
    expect([...node.serializeLines()]).toEqual(['<q Z="0.5" W="-0.5"/>']);
  });

  it('formats colors as AARRGGBB and parses them back', () => {
    expect(formatColor(1, 0.5, 0, 1)).toBe('FFFF8000');
    expect(formatColor(2, -1, 0, 0)).toBe('00FF0000');
    expect(parseColor('80FF0000')).toEqual([1, 0, 0, 128 / 255]);
    expect(parseColor('FF00')).toBeUndefined();
  });
});
