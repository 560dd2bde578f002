import { describe, it, expect } from 'vitest';
import { Svg, Group, Rect, Text, TSpan, Path, Line } from '../../../src/diagram/svg';

describe('Group', () => {
  it('renders a bare group with no attributes', () => {
    expect(new Group().render()).toBe('<g></g>');
  });

  it('writes class before transform and nests children', () => {
    const group = new Group({
      className: 'match',
      transform: 'translate(10,0)',
      children: [new Group({ className: 'inner' })],
    });
    expect(group.render()).toBe('<g class="match" transform="translate(10,0)"><g class="inner"></g></g>');
  });
});

describe('Rect', () => {
  it('omits zero and empty optional attributes', () => {
    expect(new Rect({ x: 0, y: 0, width: 35.2, height: 24, rx: 0, fill: '' }).render()).toBe(
      '<rect x="0" y="0" width="35.2" height="24"/>',
    );
  });

  it('writes attributes in a fixed order', () => {
    const rect = new Rect({
      className: 'box',
      strokeWidth: 2,
      stroke: '#908c83',
      fill: 'none',
      ry: 3,
      rx: 3,
      height: 58,
      width: 87.2,
      y: 0,
      x: 0,
    });
    expect(rect.render()).toBe(
      '<rect x="0" y="0" width="87.2" height="58" rx="3" ry="3" fill="none" stroke="#908c83" stroke-width="2" class="box"/>',
    );
  });
});

describe('Text', () => {
  it('escapes its content', () => {
    const text = new Text({ x: 5, y: 10, content: 'a < b & "c"' });
    expect(text.render()).toBe('<text x="5" y="10">a &lt; b &amp; &quot;c&quot;</text>');
  });

  it('renders spans instead of content when given', () => {
    const text = new Text({
      x: 17.6,
      y: 16,
      fontFamily: 'monospace',
      fontSize: 14,
      anchor: 'middle',
      content: 'ignored',
      spans: [new TSpan({ content: '"', className: 'quote' }), new TSpan({ content: 'x', fill: '#f00' })],
    });
    expect(text.render()).toBe(
      '<text x="17.6" y="16" font-family="monospace" font-size="14" text-anchor="middle">' +
        '<tspan class="quote">&quot;</tspan><tspan fill="#f00">x</tspan></text>',
    );
  });
});

describe('Path', () => {
  it('defaults fill to none', () => {
    expect(new Path({ d: 'M 0 0 H 10' }).render()).toBe('<path d="M 0 0 H 10" fill="none"/>');
  });

  it('writes stroke, width and class after fill', () => {
    const path = new Path({ d: 'M 0 1', stroke: '#000', strokeWidth: 2, className: 'loop-path' });
    expect(path.render()).toBe('<path d="M 0 1" fill="none" stroke="#000" stroke-width="2" class="loop-path"/>');
  });
});

describe('Line', () => {
  it('writes both endpoints', () => {
    const line = new Line({ x1: 5, y1: 22, x2: 10, y2: 22, stroke: '#000', strokeWidth: 2 });
    expect(line.render()).toBe('<line x1="5" y1="22" x2="10" y2="22" stroke="#000" stroke-width="2"/>');
  });
});

describe('Svg', () => {
  it('writes the namespace, size, viewBox and style before children', () => {
    const svg = new Svg({
      width: 55.2,
      height: 44,
      viewBox: '0 0 55.2 44',
      style: '.quote { fill: #000; }',
      children: [new Group()],
    });
    expect(svg.render()).toBe(
      '<svg xmlns="http://www.w3.org/2000/svg" width="55.2" height="44" viewBox="0 0 55.2 44">' +
        '<style>.quote { fill: #000; }</style><g></g></svg>',
    );
  });
});
