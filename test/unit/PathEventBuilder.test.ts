import { describe, it, expect } from 'vitest';
import { PathEventBuilder } from '../../src/geometry/PathEventBuilder.js';
import { translatePathEvents } from '../../src/geometry/PathTranslator.js';

describe('PathEventBuilder', () => {
  it('should record segment starts and subpath ends', () => {
    const events = new PathEventBuilder()
      .begin({ x: 0, y: 0 })
      .lineTo({ x: 4, y: 0 })
      .quadraticBezierTo({ x: 6, y: 2 }, { x: 4, y: 4 })
      .end(true)
      .build();

    expect(events).toEqual([
      { type: 'begin', at: { x: 0, y: 0 } },
      { type: 'line', from: { x: 0, y: 0 }, to: { x: 4, y: 0 } },
      { type: 'quadratic', from: { x: 4, y: 0 }, ctrl: { x: 6, y: 2 }, to: { x: 4, y: 4 } },
      { type: 'end', last: { x: 4, y: 4 }, first: { x: 0, y: 0 }, close: true },
    ]);
  });

  it('should end an open subpath on build', () => {
    const events = new PathEventBuilder()
      .begin({ x: 1, y: 1 })
      .cubicBezierTo({ x: 2, y: 0 }, { x: 3, y: 0 }, { x: 4, y: 1 })
      .build();

    expect(events[events.length - 1]).toEqual({
      type: 'end',
      last: { x: 4, y: 1 },
      first: { x: 1, y: 1 },
      close: false,
    });
  });

  it('should reset after build', () => {
    const builder = new PathEventBuilder();
    builder.begin({ x: 0, y: 0 }).lineTo({ x: 1, y: 1 }).build();

    expect(builder.isInSubpath()).toBe(false);
    expect(builder.build()).toEqual([]);
  });

  it('should throw on segments outside a subpath', () => {
    const builder = new PathEventBuilder();

    expect(() => builder.lineTo({ x: 1, y: 1 })).toThrow(
      'lineTo called outside of a subpath; call begin() first'
    );
    expect(() => builder.end()).toThrow('end called outside of a subpath');
  });

  it('should throw on begin inside a subpath', () => {
    const builder = new PathEventBuilder().begin({ x: 0, y: 0 });

    expect(() => builder.begin({ x: 1, y: 1 })).toThrow(
      'Cannot begin a subpath while another one is open'
    );
  });

  it('should produce events the translator accepts without repair', () => {
    const events = new PathEventBuilder()
      .begin({ x: 0, y: 0 })
      .lineTo({ x: 10, y: 0 })
      .lineTo({ x: 10, y: 10 })
      .end(true)
      .begin({ x: 20, y: 20 })
      .lineTo({ x: 30, y: 20 })
      .end()
      .build();

    expect(translatePathEvents(events)?.commands.map((command) => command.type)).toEqual([
      'moveTo',
      'lineTo',
      'lineTo',
      'lineTo',
      'close',
      'moveTo',
      'lineTo',
    ]);
  });
});
