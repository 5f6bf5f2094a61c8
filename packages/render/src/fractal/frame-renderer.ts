import type { Complex, FrameRenderResult, FrameSink } from '@julia-drift/protocol';
import { ANSIBuilder } from '../ansi/builder.js';
import { FrameWriteError } from '../errors.js';
import { cellIm, cellRe, escapeCountAt } from './escape.js';
import { colorIndex, shadeChar } from './shade.js';

const BLANK = ' ';

/**
 * Render one frame of the Julia set for `parameter` and hand it to `sink`.
 *
 * Cells are emitted in row-major order. A color directive is written only when
 * the color changes from the one active in the stream; interior cells reset
 * the color and print a blank, and every row ends uncolored.
 */
export function renderFrameDetailed(
  parameter: Complex,
  width: number,
  height: number,
  maxIters: number,
  sink: FrameSink,
  ansi: ANSIBuilder = new ANSIBuilder()
): FrameRenderResult {
  ansi.clear();

  const cRe = parameter.re;
  const cIm = parameter.im;
  let directives = 0;
  let naiveDirectives = 0;
  let glyphs = 0;

  for (let y = 0; y < height; y++) {
    const im = cellIm(y, height);
    let active: number | null = null;
    let lastColored = false;

    for (let x = 0; x < width; x++) {
      const iters = escapeCountAt(cRe, cIm, cellRe(x, width), im, maxIters);

      if (iters >= maxIters) {
        if (active !== null) {
          ansi.resetAttributes();
          directives++;
          active = null;
        }
        ansi.write(BLANK);
        lastColored = false;
      } else {
        const norm = iters / maxIters;
        const color = colorIndex(norm);
        if (color !== active) {
          ansi.setForeground256(color);
          directives++;
          active = color;
        }
        ansi.write(shadeChar(norm));
        lastColored = true;
      }
      glyphs++;
    }

    if (active !== null) {
      ansi.resetAttributes();
      directives++;
    }
    ansi.newline();

    // Per-glyph encoding: one directive per cell plus the closing reset
    naiveDirectives += width + (lastColored ? 1 : 0);
  }

  const frame = ansi.build();
  try {
    sink.write(frame);
  } catch (error) {
    if (error instanceof FrameWriteError) throw error;
    throw new FrameWriteError('Failed to write frame', { cause: error });
  }

  return {
    directives,
    naiveDirectives,
    glyphs,
    bytes: Buffer.byteLength(frame, 'utf8'),
  };
}

/**
 * Render one frame; returns the number of color directives emitted
 */
export function renderFrame(
  parameter: Complex,
  width: number,
  height: number,
  maxIters: number,
  sink: FrameSink
): number {
  return renderFrameDetailed(parameter, width, height, maxIters, sink).directives;
}
