import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { adjacencyCommand } from '../../../cli/commands/adjacency.js';
import { runCommand } from '../../../cli/commands/run.js';
import { satisfyCommand } from '../../../cli/commands/satisfy.js';
import { scoreCommand } from '../../../cli/commands/score.js';
import { loadConfig, type LoadConfigOptions } from '../../../cli/lib/config.js';
import type { CommandContext } from '../../../cli/lib/layers.js';
import { createCLILogger } from '../../../cli/lib/logger.js';
import { FailureThresholdError, LayerReadError } from '../../../core/errors.js';
import type { RawRecord } from '../../../core/types.js';
import { layerRecords, readLayer } from '../../../io/geojson-layers.js';
import { featureCollection, rawCell, rawSite } from '../../utils/fixtures.js';

const CELLS = [
  rawCell('C1', [0, 0], { zone_id: 'Z' }),
  rawCell('C2', [3, 2], { zone_id: 'Z' }),
  rawCell('C3', [9, 0], { zone_id: 'Z' }),
];

const SITES = [
  rawSite('TA-1', 'A', { zone_id: 'Z', cell_id: 'C1', corridor_id: 'CORR-1' }),
  rawSite('TB-C1', 'B', { zone_id: 'Z', cell_id: 'C1' }),
  rawSite('TB-C2', 'B', { zone_id: 'Z', cell_id: 'C2' }),
  rawSite('TB-C3', 'B', { zone_id: 'Z', cell_id: 'C3' }),
  rawSite('TB-ALT', 'B', { zone_id: 'Z', cell_id: 'C2', notes: 'ALT' }),
];

describe('planning commands', () => {
  let dir: string;
  let data: string;
  let printed: string[];

  const paths = () => ({
    cells: join(data, 'hex_cells.geojson'),
    sites: join(data, 'sites.geojson'),
    rollup: join(data, 'tierb_after_tiera_by_zone.csv'),
    requirements: join(data, 'tierb_requirements_by_zone.csv'),
  });

  const writeLayer = async (name: string, records: readonly RawRecord[]): Promise<void> => {
    await writeFile(join(data, name), JSON.stringify(featureCollection(records)), 'utf-8');
  };

  const context = (options: Omit<LoadConfigOptions, 'env' | 'cwd'> = {}): CommandContext => {
    const config = loadConfig({ ...options, env: {}, cwd: dir });
    const logger = createCLILogger({
      level: 'error',
      json: config.json,
      write: () => undefined,
      print: (text) => printed.push(text),
    });
    return { config, logger, cwd: dir };
  };

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'site-planner-cli-'));
    data = join(dir, 'data');
    printed = [];
    await mkdir(data);
    await writeLayer('hex_cells.geojson', CELLS);
    await writeLayer('sites.geojson', SITES);
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  describe('run', () => {
    it('scores cells, applies coverage and writes every output', async () => {
      const result = await runCommand(context());

      expect(result.issues).toEqual([]);
      expect(result.written).toEqual([paths().cells, paths().requirements, paths().sites, paths().rollup]);

      expect(await readFile(paths().rollup, 'utf-8')).toBe(
        'zone_id,tierB_required_before,tierB_required_after,tierB_alt_total,tierA_sites\nZ,3,1,1,1\n'
      );
      expect(await readFile(paths().requirements, 'utf-8')).toBe(
        'zone_id,tierB_sites_required,tierB_alternate_required,total\nZ,3,0,3\n'
      );

      const cells = layerRecords(await readLayer('cells', paths().cells));
      expect(cells[0]).toMatchObject({
        cell_id: 'C1',
        confidence_score: 4,
        confidence_class: 'HIGH',
        tierB_sites_required: 1,
        tierB_alternate_required: 0,
        priority_score: 0.5,
        tierC_demand_class: 'MED',
      });

      const sites = layerRecords(await readLayer('sites', paths().sites));
      expect(sites.map((site) => [site['site_id'], site['status'], site['satisfied_by']])).toEqual([
        ['TA-1', 'PENDING', undefined],
        ['TB-C1', 'SATISFIED', 'TA-1'],
        ['TB-C2', 'SATISFIED', 'TA-1'],
        ['TB-C3', 'PENDING', undefined],
        ['TB-ALT', 'PENDING', undefined],
      ]);
      expect(sites[1]['satisfied_corridor_id']).toBe('CORR-1');
    });

    it('writes nothing on a second run', async () => {
      await runCommand(context());
      const cellsAfterFirst = await readFile(paths().cells, 'utf-8');

      const second = await runCommand(context());

      expect(second.written).toEqual([]);
      expect(second.result.coverage?.coverage.patches).toEqual([]);
      expect(await readFile(paths().cells, 'utf-8')).toBe(cellsAfterFirst);
    });

    it('writes nothing on a dry run', async () => {
      const before = await readFile(paths().sites, 'utf-8');

      const result = await runCommand(context({ overrides: { dryRun: true } }));

      expect(result.written).toEqual([]);
      expect(result.result.coverage?.coverage.summary.satisfiedRequired).toBe(2);
      expect(await readFile(paths().sites, 'utf-8')).toBe(before);
    });
  });

  describe('score', () => {
    it('writes the cell layer and the requirements report only', async () => {
      const result = await scoreCommand(context());

      expect(result.written).toEqual([paths().cells, paths().requirements]);
      expect(result.scoring.requirements).toEqual([
        { zone_id: 'Z', tierB_sites_required: 3, tierB_alternate_required: 0, total: 3 },
      ]);
    });

    it('aborts when too many cells fail validation', async () => {
      await writeLayer('hex_cells.geojson', [
        rawCell('C1', [0, 0]),
        rawCell('', [3, 2]),
        rawCell('', [9, 0]),
      ]);

      await expect(scoreCommand(context())).rejects.toBeInstanceOf(FailureThresholdError);
    });

    it('fails on a missing cell layer', async () => {
      await rm(paths().cells);
      await expect(scoreCommand(context())).rejects.toBeInstanceOf(LayerReadError);
    });
  });

  describe('satisfy', () => {
    it('reports sites with an unresolved home cell', async () => {
      await writeLayer('sites.geojson', [...SITES, rawSite('TB-GHOST', 'B', { zone_id: 'Z', cell_id: 'GHOST' })]);

      const result = await satisfyCommand(context({ overrides: { json: true } }));

      expect(result.issues.map((issue) => [issue.kind, issue.recordId])).toEqual([
        ['unresolved-cell', 'TB-GHOST'],
      ]);
      expect(printed).toEqual([
        '[{"zone_id":"Z","tierB_required_before":4,"tierB_required_after":2,"tierB_alt_total":1,"tierA_sites":1}]',
        '[{"zone_id":"Z","site_id":"TB-GHOST","reason":"cell_id GHOST is not a known cell and its location resolves to none"}]',
      ]);
      expect(result.written).toEqual([paths().sites, paths().rollup]);
      expect(await readFile(paths().rollup, 'utf-8')).toBe(
        'zone_id,tierB_required_before,tierB_required_after,tierB_alt_total,tierA_sites\nZ,4,2,1,1\n'
      );
    });

    it('prints the zone rollup as JSON with --json', async () => {
      await satisfyCommand(context({ overrides: { json: true } }));

      expect(printed).toEqual([
        '[{"zone_id":"Z","tierB_required_before":3,"tierB_required_after":1,"tierB_alt_total":1,"tierA_sites":1}]',
      ]);
    });
  });

  describe('adjacency', () => {
    it('summarizes neighbour counts without writing', async () => {
      const result = await adjacencyCommand(context());

      expect(result.written).toEqual([]);
      expect(result.stats.cells).toBe(3);
      expect(result.stats.isolated).toEqual(['C3']);
      expect([...result.stats.histogram.entries()]).toEqual([
        [0, 1],
        [1, 2],
      ]);
      expect(printed).toEqual([
        ['neighbors | cells', '----------+------', '0         | 1    ', '1         | 2    '].join('\n'),
      ]);
    });
  });
});
