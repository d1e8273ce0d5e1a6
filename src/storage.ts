/**
 * Storage Module
 *
 * Persistence boundary of the engine. `CountStore` is what the processing code depends
 * on; `JsonCountStore` keeps one JSON document per record plus a reference document of
 * factor tables under the data directory.
 */

import path from 'path';
import { DbError } from './errors.js';
import {
  recordDocumentSchema,
  referenceDocumentSchema,
  type RecordDocument,
  type ReferenceDocument,
  type StoredBikePedRow,
  type StoredClassRow,
  type StoredVolumeRow,
} from './schemas.js';
import { COUNT_KINDS } from './services/CountKinds.js';
import { FileService } from './services/FileService.js';
import type {
  AadvEntry,
  BikePedKindName,
  BinnedBikePedRow,
  BinnedVolumeRow,
  CountHeader,
  CountTimestamp,
  FifteenMinuteBikePed,
  FifteenMinuteVehicle,
  ImportLogEntry,
  NonNormalAvgSpeedCount,
  NonNormalVolCount,
  SeasonalFactorRow,
  TimeBinnedSpeedRangeCount,
  TimeBinnedVehicleClassCount,
  VehicleClassTally,
  VehicleKindName,
} from './types.js';
import {
  createLogger,
  FILESYSTEM,
  formatDateTime,
  LOG_NAMESPACES,
  parseDateTime,
  toDateString,
} from './utils/index.js';

const logger = createLogger(LOG_NAMESPACES.STORAGE);

/**
 * Stored class row with its volume and class tallies
 */
export type StoredClassCount = BinnedVolumeRow & VehicleClassTally;

/**
 * Everything the engine reads from and writes to persistent storage
 */
export interface CountStore {
  getHeader(recordnum: number): Promise<CountHeader | null>;
  saveHeader(header: CountHeader): Promise<void>;

  /** Binned volume rows with a direction column, ordered by date and time */
  getBinnedVolumes(recordnum: number, kind: VehicleKindName): Promise<BinnedVolumeRow[]>;
  /** Binned bicycle or pedestrian rows, ordered by date and time */
  getBikePedCounts(recordnum: number, kind: BikePedKindName): Promise<BinnedBikePedRow[]>;
  getClassCounts(recordnum: number): Promise<StoredClassCount[]>;
  getNonNormalVolCounts(recordnum: number): Promise<NonNormalVolCount[]>;

  /** Each replace deletes every existing row of the record before inserting */
  replaceClassAndSpeedCounts(
    recordnum: number,
    vehicleClassCounts: readonly TimeBinnedVehicleClassCount[],
    speedRangeCounts: readonly TimeBinnedSpeedRangeCount[],
  ): Promise<void>;
  replaceFifteenMinuteVolumes(recordnum: number, rows: readonly FifteenMinuteVehicle[]): Promise<void>;
  replaceBikePedCounts(recordnum: number, kind: BikePedKindName, rows: readonly FifteenMinuteBikePed[]): Promise<void>;
  replaceNonNormalVolCounts(recordnum: number, rows: readonly NonNormalVolCount[]): Promise<void>;
  replaceNonNormalAvgSpeedCounts(recordnum: number, rows: readonly NonNormalAvgSpeedCount[]): Promise<void>;

  getSeasonalFactor(fc: number, year: number, month: number, dayOfWeek: number): Promise<SeasonalFactorRow | null>;
  getBicycleFactor(group: string, year: number, month: number, dayOfWeek: number): Promise<number | null>;
  getPedestrianFactor(month: number): Promise<number | null>;
  /** Equipment correction factor of a count type, null when it has none */
  getEquipmentFactor(countType: string): Promise<number | null>;
  getExcludedDays(): Promise<string[]>;

  /**
   * Replace the AADVs of a record calculated on `dateCalculated` and set the header's
   * aadv to the value with no direction, as one write
   */
  replaceAadv(recordnum: number, dateCalculated: string, entries: readonly AadvEntry[]): Promise<void>;
  getAadv(recordnum: number): Promise<AadvEntry[]>;

  appendImportLog(entry: ImportLogEntry): Promise<void>;
  getImportLog(recordnum: number): Promise<ImportLogEntry[]>;
}

function toTimestamp(countdate: string, counttime: string): CountTimestamp {
  const parsed = parseDateTime(counttime);
  if (!parsed) {
    throw new DbError(`invalid counttime '${counttime}' on ${countdate}`);
  }
  return { countdate, counttime: parsed };
}

function byTimestamp(a: CountTimestamp, b: CountTimestamp): number {
  return a.countdate.localeCompare(b.countdate) || a.counttime.getTime() - b.counttime.getTime();
}

function toBinnedVolume(row: StoredVolumeRow): BinnedVolumeRow {
  return {
    ...toTimestamp(row.countdate, row.counttime),
    lane: row.lane,
    direction: row.direction,
    total: row.total,
  };
}

function storedTimestamp(datetime: Date): { countdate: string; counttime: string } {
  return { countdate: toDateString(datetime), counttime: formatDateTime(datetime) };
}

function emptyRecord(header: CountHeader): RecordDocument {
  return {
    header,
    classCounts: [],
    speedCounts: [],
    fifteenMinuteVolumes: [],
    bicycleCounts: [],
    pedestrianCounts: [],
    volCounts: [],
    avgSpeedCounts: [],
    aadv: [],
    importLog: [],
  };
}

/**
 * `CountStore` over whole-record documents. Subclasses decide where the documents live;
 * every write loads, changes and saves one document, so each write is all-or-nothing.
 */
export abstract class DocumentCountStore implements CountStore {
  protected abstract loadRecord(recordnum: number): Promise<RecordDocument | null>;
  protected abstract saveRecord(record: RecordDocument): Promise<void>;
  protected abstract loadReference(): Promise<ReferenceDocument>;

  private async requireRecord(recordnum: number): Promise<RecordDocument> {
    const record = await this.loadRecord(recordnum);
    if (!record) {
      throw new DbError(`${recordnum} not found in tc_header table`);
    }
    return record;
  }

  private async updateRecord(recordnum: number, update: (record: RecordDocument) => void): Promise<void> {
    const record = await this.requireRecord(recordnum);
    update(record);
    await this.saveRecord(record);
  }

  async getHeader(recordnum: number): Promise<CountHeader | null> {
    const record = await this.loadRecord(recordnum);
    return record?.header ?? null;
  }

  async saveHeader(header: CountHeader): Promise<void> {
    const record = (await this.loadRecord(header.recordnum)) ?? emptyRecord(header);
    record.header = header;
    await this.saveRecord(record);
  }

  async getBinnedVolumes(recordnum: number, kind: VehicleKindName): Promise<BinnedVolumeRow[]> {
    const record = await this.requireRecord(recordnum);
    const rows: readonly StoredVolumeRow[] = record[COUNT_KINDS[kind].table];
    return rows.map(toBinnedVolume).sort(byTimestamp);
  }

  async getBikePedCounts(recordnum: number, kind: BikePedKindName): Promise<BinnedBikePedRow[]> {
    const record = await this.requireRecord(recordnum);
    const rows: readonly StoredBikePedRow[] = record[COUNT_KINDS[kind].table];
    return rows
      .map((row) => ({
        ...toTimestamp(row.countdate, row.counttime),
        total: row.total,
        incount: row.incount,
        outcount: row.outcount,
      }))
      .sort(byTimestamp);
  }

  async getClassCounts(recordnum: number): Promise<StoredClassCount[]> {
    const record = await this.requireRecord(recordnum);
    return record.classCounts
      .map(({ countdate, counttime, ...rest }) => ({ ...rest, ...toTimestamp(countdate, counttime) }))
      .sort(byTimestamp);
  }

  async getNonNormalVolCounts(recordnum: number): Promise<NonNormalVolCount[]> {
    const record = await this.requireRecord(recordnum);
    return record.volCounts;
  }

  async replaceClassAndSpeedCounts(
    recordnum: number,
    vehicleClassCounts: readonly TimeBinnedVehicleClassCount[],
    speedRangeCounts: readonly TimeBinnedSpeedRangeCount[],
  ): Promise<void> {
    await this.updateRecord(recordnum, (record) => {
      record.classCounts = vehicleClassCounts.map(
        ({ recordnum: _recordnum, datetime, ...rest }): StoredClassRow => ({ ...storedTimestamp(datetime), ...rest }),
      );
      record.speedCounts = speedRangeCounts.map(({ recordnum: _recordnum, datetime, ...rest }) => ({
        ...storedTimestamp(datetime),
        ...rest,
      }));
    });
    logger.info(
      `Saved ${vehicleClassCounts.length} class and ${speedRangeCounts.length} speed rows for ${recordnum}`,
    );
  }

  async replaceFifteenMinuteVolumes(recordnum: number, rows: readonly FifteenMinuteVehicle[]): Promise<void> {
    await this.updateRecord(recordnum, (record) => {
      record.fifteenMinuteVolumes = rows.map(({ datetime, count, direction, lane }) => ({
        ...storedTimestamp(datetime),
        lane,
        direction,
        total: count,
      }));
    });
    logger.info(`Saved ${rows.length} fifteen-minute volume rows for ${recordnum}`);
  }

  async replaceBikePedCounts(
    recordnum: number,
    kind: BikePedKindName,
    rows: readonly FifteenMinuteBikePed[],
  ): Promise<void> {
    await this.updateRecord(recordnum, (record) => {
      record[COUNT_KINDS[kind].table] = rows.map(({ datetime, total, incount, outcount }) => ({
        ...storedTimestamp(datetime),
        total,
        incount,
        outcount,
      }));
    });
    logger.info(`Saved ${rows.length} ${kind} rows for ${recordnum}`);
  }

  async replaceNonNormalVolCounts(recordnum: number, rows: readonly NonNormalVolCount[]): Promise<void> {
    await this.updateRecord(recordnum, (record) => {
      record.volCounts = [...rows];
    });
    logger.info(`Saved ${rows.length} hourly volume rows for ${recordnum}`);
  }

  async replaceNonNormalAvgSpeedCounts(recordnum: number, rows: readonly NonNormalAvgSpeedCount[]): Promise<void> {
    await this.updateRecord(recordnum, (record) => {
      record.avgSpeedCounts = [...rows];
    });
    logger.info(`Saved ${rows.length} hourly speed rows for ${recordnum}`);
  }

  async getSeasonalFactor(
    fc: number,
    year: number,
    month: number,
    dayOfWeek: number,
  ): Promise<SeasonalFactorRow | null> {
    const { seasonalFactors } = await this.loadReference();
    return (
      seasonalFactors.find(
        (row) => row.fc === fc && row.year === year && row.month === month && row.dayOfWeek === dayOfWeek,
      ) ?? null
    );
  }

  async getBicycleFactor(group: string, year: number, month: number, dayOfWeek: number): Promise<number | null> {
    const { bicycleFactors } = await this.loadReference();
    const row = bicycleFactors.find(
      (factor) =>
        factor.group === group && factor.year === year && factor.month === month && factor.dayOfWeek === dayOfWeek,
    );
    return row?.factor ?? null;
  }

  async getPedestrianFactor(month: number): Promise<number | null> {
    const { pedestrianFactors } = await this.loadReference();
    return pedestrianFactors.find((factor) => factor.month === month)?.factor ?? null;
  }

  async getEquipmentFactor(countType: string): Promise<number | null> {
    const { countTypes } = await this.loadReference();
    return countTypes.find((row) => row.countType === countType)?.factor2 ?? null;
  }

  async getExcludedDays(): Promise<string[]> {
    const { excludedDays } = await this.loadReference();
    return excludedDays;
  }

  async replaceAadv(recordnum: number, dateCalculated: string, entries: readonly AadvEntry[]): Promise<void> {
    await this.updateRecord(recordnum, (record) => {
      record.aadv = [
        ...record.aadv.filter((entry) => entry.dateCalculated !== dateCalculated),
        ...entries,
      ];
      const overall = entries.find((entry) => entry.direction === null);
      if (overall) {
        record.header.aadv = overall.aadv;
      }
    });
    logger.info(`Saved ${entries.length} AADV value(s) for ${recordnum} on ${dateCalculated}`);
  }

  async getAadv(recordnum: number): Promise<AadvEntry[]> {
    const record = await this.requireRecord(recordnum);
    return record.aadv;
  }

  async appendImportLog(entry: ImportLogEntry): Promise<void> {
    await this.updateRecord(entry.recordnum, (record) => {
      record.importLog.push(entry);
    });
  }

  async getImportLog(recordnum: number): Promise<ImportLogEntry[]> {
    const record = await this.requireRecord(recordnum);
    return record.importLog;
  }
}

/**
 * Count store kept as JSON files under a data directory:
 * `records/<recordnum>.json` and `reference.json`.
 */
export class JsonCountStore extends DocumentCountStore {
  private readonly fileService = new FileService();
  private reference: ReferenceDocument | null = null;

  constructor(private readonly dataDir: string) {
    super();
  }

  private recordPath(recordnum: number): string {
    return path.join(this.dataDir, FILESYSTEM.RECORDS_DIR, `${recordnum}.json`);
  }

  protected async loadRecord(recordnum: number): Promise<RecordDocument | null> {
    return this.fileService.readJson(
      this.recordPath(recordnum),
      recordDocumentSchema,
      `loading record ${recordnum}`,
    );
  }

  protected async saveRecord(record: RecordDocument): Promise<void> {
    await this.fileService.writeJson(
      this.recordPath(record.header.recordnum),
      record,
      `saving record ${record.header.recordnum}`,
    );
  }

  /**
   * Reference tables are read once per store
   */
  protected async loadReference(): Promise<ReferenceDocument> {
    if (!this.reference) {
      const filePath = path.join(this.dataDir, FILESYSTEM.REFERENCE_FILE);
      const reference = await this.fileService.readJson(filePath, referenceDocumentSchema, 'loading reference tables');
      if (!reference) {
        throw new DbError(`reference tables not found at ${filePath}`);
      }
      this.reference = reference;
    }
    return this.reference;
  }
}
