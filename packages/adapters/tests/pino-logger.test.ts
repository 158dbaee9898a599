import { describe, expect, it } from 'vitest';
import { PinoLogger } from '../src/index';

function capture() {
  const lines: Array<Record<string, unknown>> = [];
  return {
    lines,
    destination: {
      write(msg: string): void {
        lines.push(JSON.parse(msg));
      }
    }
  };
}

describe('PinoLogger', () => {
  it('writes structured lines with bound fields from parents and children', () => {
    const { lines, destination } = capture();
    const logger = new PinoLogger({ level: 'debug', name: 'forkline', bindings: { flow: 'training' }, destination });

    logger.child({ step: 'start' }).info({ width: 2 }, 'Spawning parallel region');
    logger.trace('hidden below debug');
    logger.debug('visible');

    expect(lines).toHaveLength(2);
    expect(lines[0]).toMatchObject({ level: 30, name: 'forkline', flow: 'training', step: 'start', width: 2, msg: 'Spawning parallel region' });
    expect(lines[1]).toMatchObject({ level: 20, msg: 'visible' });
  });
});
