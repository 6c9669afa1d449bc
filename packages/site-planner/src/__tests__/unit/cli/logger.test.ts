import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { createCLILogger, type CLILoggerConfig } from '../../../cli/lib/logger.js';

const ANSI = /\x1b\[\d+m/g;

function capture(config: Partial<CLILoggerConfig> = {}) {
  const lines: string[] = [];
  const printed: string[] = [];
  let clock = 0;
  const logger = createCLILogger({
    write: (line) => lines.push(line),
    print: (text) => printed.push(text),
    now: () => clock,
    ...config,
  });
  return {
    logger,
    lines,
    printed,
    setClock: (value: number) => {
      clock = value;
    },
  };
}

const EntrySchema = z.record(z.unknown());

function parsed(line: string): Record<string, unknown> {
  return EntrySchema.parse(JSON.parse(line));
}

describe('CLILogger', () => {
  it('writes JSON lines with service and metadata', () => {
    const { logger, lines } = capture({ json: true });

    logger.info('Cells scored', { scored: 3 });

    expect(lines).toHaveLength(1);
    const entry = parsed(lines[0]);
    expect(entry).toMatchObject({ level: 'info', message: 'Cells scored', service: 'site-planner', scored: 3 });
    expect(typeof entry['timestamp']).toBe('string');
  });

  it('drops entries below the configured level', () => {
    const { logger, lines } = capture({ json: true, level: 'warn' });

    logger.debug('a');
    logger.info('b');
    logger.warn('c');
    logger.error('d');

    expect(lines.map((line) => parsed(line)['message'])).toEqual(['c', 'd']);
  });

  it('writes one human-readable line per entry', () => {
    const { logger, lines } = capture();

    logger.warn('Cells with no neighbours', { count: 2, cells: ['C1', 'C9'] });

    expect(lines[0].replace(ANSI, '')).toMatch(
      /^\S+ WARN  Cells with no neighbours \(count=2 cells=\["C1","C9"\]\)$/
    );
  });

  it('tags entries with the command and times it', () => {
    const { logger, lines, setClock } = capture({ json: true });

    setClock(100);
    logger.commandStart('score', { dryRun: true });
    setClock(350);
    logger.commandEnd(true, { scored: 2 });

    expect(lines).toHaveLength(1);
    expect(parsed(lines[0])).toMatchObject({
      level: 'info',
      message: 'Command completed',
      command: 'score',
      duration_ms: 250,
      scored: 2,
    });
  });

  it('logs a failed command as an error', () => {
    const { logger, lines } = capture({ json: true });

    logger.commandStart('run');
    logger.commandEnd(false);

    expect(parsed(lines[0])).toMatchObject({ level: 'error', message: 'Command failed', command: 'run' });
  });

  it('logs the command start at debug level', () => {
    const { logger, lines } = capture({ json: true, level: 'debug' });

    logger.commandStart('adjacency', { snapDecimals: null });

    expect(parsed(lines[0])).toMatchObject({
      level: 'debug',
      message: 'Starting adjacency',
      command: 'adjacency',
      snapDecimals: null,
    });
  });

  describe('table', () => {
    const rows = [{ zone_id: 'Z1', total: 3 }];

    it('prints a text table', () => {
      const { logger, printed, lines } = capture();

      logger.table(rows, ['zone_id']);

      expect(printed).toEqual(['zone_id\n-------\nZ1     ']);
      expect(lines).toEqual([]);
    });

    it('prints compact JSON with --json', () => {
      const { logger, printed } = capture({ json: true });

      logger.table(rows, ['zone_id']);

      expect(printed).toEqual(['[{"zone_id":"Z1","total":3}]']);
    });
  });
});
