import { describe, it, expect } from 'vitest';
import {
  PathBuilder,
  calculatePathBounds,
  commandPoints,
  formatNumber,
  pathDataToSvg,
} from '../../src/geometry/PathBuilder.js';

describe('PathBuilder', () => {
  describe('finish', () => {
    it('should reject an empty sequence', () => {
      expect(new PathBuilder().finish()).toBeUndefined();
    });

    it('should reject a sequence of moves only', () => {
      const builder = new PathBuilder().moveTo(0, 0).moveTo(5, 5).close();

      expect(builder.finish()).toBeUndefined();
    });

    it('should reject non-finite coordinates', () => {
      const builder = new PathBuilder().moveTo(0, 0).lineTo(Infinity, 1);

      expect(builder.finish()).toBeUndefined();
    });

    it('should keep consecutive moves', () => {
      const data = new PathBuilder().moveTo(0, 0).moveTo(1, 1).lineTo(2, 2).finish();

      expect(data?.commands).toHaveLength(3);
      expect(data?.bounds).toEqual({ minX: 0, minY: 0, maxX: 2, maxY: 2 });
    });

    it('should return a copy of the commands', () => {
      const builder = new PathBuilder().moveTo(0, 0).lineTo(1, 0);
      const data = builder.finish();
      builder.lineTo(5, 5);

      expect(data?.commands).toHaveLength(2);
      expect(builder.length).toBe(3);
    });
  });
});

describe('commandPoints', () => {
  it('should list control points before the end point', () => {
    expect(
      commandPoints({ type: 'quadTo', ctrl: { x: 1, y: 2 }, to: { x: 3, y: 4 } })
    ).toEqual([{ x: 1, y: 2 }, { x: 3, y: 4 }]);
    expect(commandPoints({ type: 'close' })).toEqual([]);
  });
});

describe('calculatePathBounds', () => {
  it('should return undefined without points', () => {
    expect(calculatePathBounds([])).toBeUndefined();
    expect(calculatePathBounds([{ type: 'close' }])).toBeUndefined();
  });
});

describe('pathDataToSvg', () => {
  it('should format every command type', () => {
    const data = new PathBuilder()
      .moveTo(0, 0)
      .lineTo(10, 0)
      .quadTo(15, 5, 10, 10)
      .cubicTo(8, 12, 2, 12, 0, 10)
      .close()
      .finish();

    expect(data && pathDataToSvg(data.commands)).toBe(
      'M 0 0 L 10 0 Q 15 5 10 10 C 8 12 2 12 0 10 Z'
    );
  });

  it('should round to the given precision', () => {
    const data = new PathBuilder().moveTo(1 / 3, 0).lineTo(2 / 3, 1).finish();

    expect(data && pathDataToSvg(data.commands, 2)).toBe('M 0.33 0 L 0.67 1');
  });
});

describe('formatNumber', () => {
  it('should drop trailing zeros', () => {
    expect(formatNumber(1.5, 8)).toBe('1.5');
    expect(formatNumber(2, 3)).toBe('2');
  });

  it('should print negative zero as 0', () => {
    expect(formatNumber(-0, 8)).toBe('0');
    expect(formatNumber(-0.0000001, 3)).toBe('0');
  });
});
