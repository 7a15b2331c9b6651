import { describe, it, expect } from 'vitest';
import {
  buildProgram,
  createManualClock,
  lerpColor,
  lerpNumber,
  loop,
  playProgram,
  withAlpha,
  type Rgba,
} from './index';

describe('stepline', () => {
  it('exports the builder and playback entry points', () => {
    expect(typeof buildProgram).toBe('function');
    expect(typeof playProgram).toBe('function');
  });

  it('fades in, pulses twice, and reports each pass through the public API', async () => {
    const clock = createManualClock();
    const log: string[] = [];
    let opacity = 0;
    let color: Rgba = { r: 1, g: 1, b: 1, a: 1 };
    const red: Rgba = { r: 1, g: 0, b: 0, a: 1 };

    const program = buildProgram((p) =>
      p
        .group(100, (g) =>
          g
            .tween({
              from: 0,
              to: 1,
              lerp: lerpNumber,
              apply: (v) => {
                opacity = v;
              },
            })
            .tween({
              from: color,
              to: red,
              lerp: lerpColor,
              apply: (v) => {
                color = v;
              },
            })
        )
        .wait(50)
        .do(() => log.push(`pass at ${clock.now()}`))
    );

    const playback = playProgram(program, {
      clock,
      scheduler: clock,
      mode: loop(2),
    });

    clock.advance(50);
    expect(opacity).toBe(0.5);
    expect(color).toEqual({ r: 1, g: 0.5, b: 0.5, a: 1 });

    // 100: group done, 150: wait done, 200: one-shot, then the second pass
    for (let i = 0; i < 7; i++) clock.advance(50);

    await expect(playback.done).resolves.toBe('finished');
    expect(log).toEqual(['pass at 200', 'pass at 400']);
    expect(withAlpha(color, 0)).toEqual({ r: 1, g: 0, b: 0, a: 0 });
  });
});
