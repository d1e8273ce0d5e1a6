import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { CountProcessor } from './processor.js';
import { createTimeBins } from './services/IntervalBinner.js';
import { MemoryCountStore } from './testing/MemoryCountStore.js';
import { formatDateTime, wallClock } from './utils/datetime.js';

const clock = (): Date => new Date(2024, 0, 15, 12);

const seasonalFactors = [
  { fc: 14, year: 2023, month: 11, dayOfWeek: 3, paFactor: 1.1, paAxle: 0.9, njFactor: 2, njAxle: 1 },
  { fc: 14, year: 2023, month: 11, dayOfWeek: 4, paFactor: 0.9, paAxle: 0.9, njFactor: 2, njAxle: 1 },
];

/** Two days of fifteen-minute volumes: 4 per period on lane 1, 2 on lane 2 */
function fifteenMinuteFile(): unknown {
  const bins = createTimeBins(wallClock(2023, 11, 7), wallClock(2023, 11, 8, 23, 45), 15);
  return {
    kind: 'fifteen-minute-vehicle',
    records: bins.flatMap((bin) => [
      { datetime: formatDateTime(bin), lane: 1, count: 4 },
      { datetime: formatDateTime(bin), lane: 2, count: 2 },
    ]),
  };
}

describe('CountProcessor', () => {
  let inputDir: string;
  let store: MemoryCountStore;

  async function writeImport(name: string, content: unknown): Promise<string> {
    const filePath = path.join(inputDir, name);
    await fs.writeFile(filePath, JSON.stringify(content), 'utf-8');
    return filePath;
  }

  beforeEach(async () => {
    inputDir = await fs.mkdtemp(path.join(os.tmpdir(), 'count-imports-'));
    store = new MemoryCountStore({ seasonalFactors });
    store.addHeader({ recordnum: 500, countKind: 'fifteen-minute-volume', mcd: '4201', fc: 14 });
    store.addHeader({ recordnum: 600, countKind: 'class', mcd: '4201', fc: 14 });
  });

  afterEach(async () => {
    await fs.rm(inputDir, { recursive: true, force: true });
  });

  describe('fifteen-minute volume files', () => {
    it('stores the volumes and their AADV', async () => {
      const filePath = await writeImport('jd-500-ew-31-na.json', fifteenMinuteFile());
      const processor = new CountProcessor({ store, inputDir, cleanupFiles: false, clock });

      const result = await processor.processFile(filePath);

      expect(result).toEqual({
        fileName: 'jd-500-ew-31-na.json',
        recordnum: 500,
        success: true,
        rowsWritten: 388,
        aadv: 518,
        problems: [],
      });
      expect(await store.getNonNormalVolCounts(500)).toHaveLength(4);
      expect((await store.getAadv(500)).map(({ direction, aadv }) => [direction, aadv])).toEqual([
        [null, 518],
        ['east', 346],
        ['west', 173],
      ]);
    });

    it('updates the header with the import metadata', async () => {
      const filePath = await writeImport('jd-500-ew-31-na.json', fifteenMinuteFile());
      await new CountProcessor({ store, inputDir, cleanupFiles: false, clock }).processFile(filePath);

      expect(await store.getHeader(500)).toMatchObject({
        importDataDate: '2024-01-15',
        status: 'imported',
        counterId: '31',
        speedLimit: null,
        representativeDate: '2023-11-08',
        aadv: 518,
      });
    });

    it('writes each step and check warning to the import log', async () => {
      const filePath = await writeImport('jd-500-ew-31-na.json', fifteenMinuteFile());
      await new CountProcessor({ store, inputDir, cleanupFiles: false, clock }).processFile(filePath);

      expect((await store.getImportLog(500)).map(({ level, message }) => [level, message])).toEqual([
        ['info', 'Imported 388 rows from jd-500-ew-31-na.json'],
        ['info', 'AADV calculated and inserted'],
        ['info', 'Checking data'],
        [
          'warn',
          'Abnormal direction proportions: west has 33.3% of total, east has 66.7%. ' +
            '(Expectation is that proportions are no less/more than 40%/60%.)',
        ],
      ]);
    });
  });

  describe('individual vehicle files', () => {
    it('stores binned and hourly rows and reports an AADV it cannot calculate', async () => {
      const vehicle = (hour: number, minute: number) => ({
        datetime: `2023-11-06 ${String(hour).padStart(2, '0')}:${String(minute).padStart(2, '0')}`,
        lane: 1,
        class: 2,
        speed: 30,
      });
      const filePath = await writeImport('jd-600-e-31-35.json', {
        kind: 'individual-vehicle',
        records: [vehicle(9, 50), vehicle(10, 5), vehicle(10, 20), vehicle(10, 35), vehicle(10, 50), vehicle(11, 10)],
      });

      const result = await new CountProcessor({ store, inputDir, cleanupFiles: false, clock }).processFile(filePath);

      expect(result.success).toBe(true);
      expect(result.rowsWritten).toBe(10);
      expect(result.aadv).toBeNull();
      expect(result.problems).toEqual([
        'Failed to calculate/insert AADV: BadIntervalCount: unable to determine interval: 0 rows on 2023-11-07',
      ]);
      expect((await store.getClassCounts(600)).map(({ counttime }) => formatDateTime(counttime))).toEqual([
        '2023-11-06T10:00:00',
        '2023-11-06T10:15:00',
        '2023-11-06T10:30:00',
        '2023-11-06T10:45:00',
      ]);
      expect((await store.getHeader(600))?.speedLimit).toBe(35);
    });
  });

  describe('failures', () => {
    it('rejects a malformed file name', async () => {
      const filePath = await writeImport('bad-name.json', fifteenMinuteFile());
      const result = await new CountProcessor({ store, inputDir, cleanupFiles: false, clock }).processFile(filePath);

      expect(result).toEqual({
        fileName: 'bad-name.json',
        recordnum: null,
        success: false,
        rowsWritten: 0,
        aadv: null,
        problems: [],
        error: "InvalidFileName: the filename 'bad-name.json' is not to specification: TooFewParts",
      });
    });

    it('rejects a file of another kind than the record', async () => {
      const filePath = await writeImport('jd-500-ew-31-na.json', { kind: 'bicycle', records: [] });
      const result = await new CountProcessor({ store, inputDir, cleanupFiles: false, clock }).processFile(filePath);

      expect(result.error).toBe('DbError: 500 is a fifteen-minute-volume count, not bicycle');
      expect(await store.getImportLog(500)).toEqual([
        {
          recordnum: 500,
          datetime: clock().toISOString(),
          level: 'error',
          message: 'Failed to import jd-500-ew-31-na.json: DbError: 500 is a fifteen-minute-volume count, not bicycle',
        },
      ]);
    });

    it('rejects a file that does not match the import format', async () => {
      const filePath = await writeImport('jd-500-ew-31-na.json', { kind: 'fifteen-minute-vehicle', records: [{}] });
      const result = await new CountProcessor({ store, inputDir, cleanupFiles: false, clock }).processFile(filePath);

      expect(result.success).toBe(false);
      expect(result.error).toMatch(/^DbError: Failed while reading jd-500-ew-31-na\.json: /);
    });
  });

  describe('processAll', () => {
    it('keeps going after a failed file and summarizes the batch', async () => {
      await writeImport('bad-name.json', fifteenMinuteFile());
      await writeImport('jd-500-ew-31-na.json', fifteenMinuteFile());
      await writeImport('jd-999-ew-31-na.json', fifteenMinuteFile());

      const summary = await new CountProcessor({ store, inputDir, cleanupFiles: false, clock }).processAll();

      expect(summary.totalFiles).toBe(3);
      expect(summary.successfulFiles).toBe(1);
      expect(summary.failedFiles).toBe(2);
      expect(summary.results.map(({ fileName, error }) => [fileName, error])).toEqual([
        ['bad-name.json', "InvalidFileName: the filename 'bad-name.json' is not to specification: TooFewParts"],
        ['jd-500-ew-31-na.json', undefined],
        ['jd-999-ew-31-na.json', 'DbError: 999 not found in tc_header table'],
      ]);
    });

    it('deletes imported files when cleanup is on', async () => {
      await writeImport('bad-name.json', fifteenMinuteFile());
      await writeImport('jd-500-ew-31-na.json', fifteenMinuteFile());

      await new CountProcessor({ store, inputDir, cleanupFiles: true, clock }).processAll();

      expect(await fs.readdir(inputDir)).toEqual(['bad-name.json']);
    });

    it('finds nothing to do in a missing directory', async () => {
      const processor = new CountProcessor({
        store,
        inputDir: path.join(inputDir, 'missing'),
        cleanupFiles: false,
        clock,
      });
      expect((await processor.processAll()).totalFiles).toBe(0);
    });
  });
});
