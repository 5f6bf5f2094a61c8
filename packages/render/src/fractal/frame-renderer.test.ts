import { describe, expect, it } from 'vitest';
import type { Complex, FrameSink } from '@julia-drift/protocol';
import { FrameWriteError } from '../errors.js';
import { cellIm, cellRe, escapeCountAt } from './escape.js';
import { renderFrame, renderFrameDetailed } from './frame-renderer.js';
import { colorIndex, shadeChar } from './shade.js';

const ESC = '\x1b';

function collect(): FrameSink & { chunks: string[]; text: () => string } {
  const chunks: string[] = [];
  return {
    chunks,
    write: (chunk: string) => {
      chunks.push(chunk);
    },
    text: () => chunks.join(''),
  };
}

/**
 * Reference encoder that styles every glyph on its own
 */
function renderPerGlyph(parameter: Complex, width: number, height: number, maxIters: number): string {
  let out = '';
  for (let y = 0; y < height; y++) {
    let colored = false;
    for (let x = 0; x < width; x++) {
      const iters = escapeCountAt(parameter.re, parameter.im, cellRe(x, width), cellIm(y, height), maxIters);
      if (iters >= maxIters) {
        out += `${ESC}[0m `;
        colored = false;
      } else {
        const norm = iters / maxIters;
        out += `${ESC}[38;5;${colorIndex(norm)}m${shadeChar(norm)}`;
        colored = true;
      }
    }
    out += colored ? `${ESC}[0m\n` : '\n';
  }
  return out;
}

/**
 * Decode styled text into (glyph, effective color) pairs
 */
function decode(text: string): Array<[string, number | null]> {
  const cells: Array<[string, number | null]> = [];
  const pattern = /\x1b\[(?:38;5;(\d+)|0)m|([^\x1b])/gu;
  let color: number | null = null;
  for (const match of text.matchAll(pattern)) {
    if (match[2] !== undefined) {
      cells.push([match[2], match[2] === '\n' ? null : color]);
    } else {
      color = match[1] !== undefined ? Number(match[1]) : null;
    }
  }
  return cells;
}

function countSets(text: string): number {
  return text.split(`${ESC}[38;5;`).length - 1;
}

describe('renderFrame', () => {
  it('should emit a single color-set directive for a run of equal colors', () => {
    const sink = collect();
    // c = 10 makes every viewport point escape after one step
    const directives = renderFrame({ re: 10, im: 0 }, 10, 1, 2, sink);

    expect(sink.text()).toBe(`${ESC}[38;5;51m**********${ESC}[0m\n`);
    expect(countSets(sink.text())).toBe(1);
    expect(directives).toBe(2);
  });

  it('should reset before interior cells and at the end of colored rows', () => {
    const sink = collect();
    const directives = renderFrame({ re: 0, im: 0 }, 4, 2, 5, sink);

    expect(sink.text()).toBe(
      `${ESC}[38;5;190m-${ESC}[38;5;48m+${ESC}[0m ${ESC}[38;5;48m+${ESC}[0m\n` +
        `${ESC}[38;5;190m-${ESC}[0m   \n`
    );
    expect(directives).toBe(7);
  });

  it('should encode the default parameter exactly', () => {
    const sink = collect();
    const directives = renderFrame({ re: -0.8, im: 0.156 }, 12, 4, 30, sink);

    const expected = [
      '<202>....<208>......<202>..<R>',
      '<202>.<208>..<214>.<220>:<39>*<129>O<R> <190>-<220>:<226>:<214>.<R>',
      '<220>:<R>  <129>O<R> <39>*<R> <39>*<R> <129>O<R>  ',
      '<208>.<214>.<226>:<220>:<190>-<R> <129>O<39>*<220>:<214>.<208>..<R>',
    ]
      .map((row) => row.replace(/<(\d+)>/g, `${ESC}[38;5;$1m`).replace(/<R>/g, `${ESC}[0m`) + '\n')
      .join('');

    expect(sink.text()).toBe(expected);
    expect(directives).toBe(38);
  });

  it('should write each frame to the sink in one piece', () => {
    const sink = collect();
    renderFrame({ re: -0.8, im: 0.156 }, 20, 6, 60, sink);
    expect(sink.chunks).toHaveLength(1);
    expect(sink.text().split('\n')).toHaveLength(7);
  });

  it('should produce the same glyphs and colors as per-glyph styling with fewer directives', () => {
    const parameters: Complex[] = [
      { re: -0.8, im: 0.156 },
      { re: -0.7, im: 0.27 },
      { re: 0.285, im: 0.01 },
      { re: 0, im: 0 },
    ];
    for (const parameter of parameters) {
      const sink = collect();
      const result = renderFrameDetailed(parameter, 48, 16, 80, sink);
      const naive = renderPerGlyph(parameter, 48, 16, 80);

      expect(decode(sink.text())).toEqual(decode(naive));
      expect(result.directives).toBeLessThanOrEqual(result.naiveDirectives);
      expect(result.naiveDirectives).toBe(naive.split(`${ESC}[`).length - 1);
    }
  });

  it('should report glyph and byte counts', () => {
    const sink = collect();
    const result = renderFrameDetailed({ re: 10, im: 0 }, 10, 1, 2, sink);
    expect(result).toEqual({
      directives: 2,
      naiveDirectives: 11,
      glyphs: 10,
      bytes: Buffer.byteLength(sink.text(), 'utf8'),
    });
  });

  it('should render only line breaks for a zero-width grid', () => {
    const sink = collect();
    expect(renderFrame({ re: 0, im: 0 }, 0, 3, 10, sink)).toBe(0);
    expect(sink.text()).toBe('\n\n\n');
  });

  it('should surface sink failures as FrameWriteError', () => {
    const failure = new Error('EPIPE');
    const sink: FrameSink = {
      write: () => {
        throw failure;
      },
    };

    expect(() => renderFrame({ re: 0, im: 0 }, 4, 2, 5, sink)).toThrow(FrameWriteError);
    try {
      renderFrame({ re: 0, im: 0 }, 4, 2, 5, sink);
    } catch (error) {
      expect(error).toBeInstanceOf(FrameWriteError);
      expect(error instanceof FrameWriteError && error.cause).toBe(failure);
    }
  });
});
