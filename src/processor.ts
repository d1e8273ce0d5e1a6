/**
 * Count Processor Module
 *
 * Imports every count file found in the input directory: bins and pivots the counts,
 * stores them, updates the count header, calculates the AADV and runs the data checks.
 * A file that fails is reported in the summary without stopping the batch.
 */

import path from 'path';
import { DbError, formatError } from './errors.js';
import { importFileSchema, type ImportFile } from './schemas.js';
import {
  AadvCalculator,
  createNonNormalAvgSpeedCount,
  createNonNormalVolCount,
  createSpeedAndClassCount,
  DataChecker,
  denormalizeVolCount,
  determineDate,
  directionForLane,
  FileService,
  parseFieldMetadata,
  vehicleClassFromCode,
} from './services/index.js';
import type { CountStore } from './storage.js';
import type {
  CountKindName,
  FieldMetadata,
  FifteenMinuteVehicle,
  ImportLogLevel,
  ImportResult,
  ImportSummary,
  IndividualVehicle,
} from './types.js';
import {
  createLogger,
  createRecordLogger,
  FILESYSTEM,
  formatDuration,
  LOG_NAMESPACES,
  parseDateTime,
  toDateString,
  today,
} from './utils/index.js';

const logger = createLogger(LOG_NAMESPACES.PROCESSOR);

/** Count kind each import file kind is stored as */
const COUNT_KIND_OF_IMPORT: { [K in ImportFile['kind']]: CountKindName } = {
  'individual-vehicle': 'class',
  'fifteen-minute-vehicle': 'fifteen-minute-volume',
  bicycle: 'bicycle',
  pedestrian: 'pedestrian',
};

/**
 * Configuration for the count processor
 */
export interface ProcessorConfig {
  store: CountStore;
  /** Directory scanned (recursively) for import files */
  inputDir: string;
  /** Delete each import file once it is imported */
  cleanupFiles: boolean;
  fileService?: FileService;
  clock?: () => Date;
}

interface StoredRows {
  rowsWritten: number;
  /** Calendar dates of the imported records */
  dates: string[];
}

function toDateTime(value: string): Date {
  const datetime = parseDateTime(value);
  if (!datetime) {
    throw new DbError(`invalid datetime '${value}'`);
  }
  return datetime;
}

/**
 * Imports count files into a `CountStore`
 */
export class CountProcessor {
  private readonly store: CountStore;
  private readonly inputDir: string;
  private readonly cleanupFiles: boolean;
  private readonly fileService: FileService;
  private readonly clock: () => Date;
  private readonly aadvCalculator: AadvCalculator;
  private readonly dataChecker: DataChecker;

  constructor(config: ProcessorConfig) {
    this.store = config.store;
    this.inputDir = config.inputDir;
    this.cleanupFiles = config.cleanupFiles;
    this.fileService = config.fileService ?? new FileService();
    this.clock = config.clock ?? (() => new Date());
    this.aadvCalculator = new AadvCalculator(this.store, this.clock);
    this.dataChecker = new DataChecker(this.store, this.clock);
  }

  /**
   * Import every file in the input directory, in path order
   */
  async processAll(): Promise<ImportSummary> {
    const startTime = this.clock();
    const files = await this.fileService.collectFiles(this.inputDir, FILESYSTEM.IMPORT_EXTENSION);

    logger.info(`Found ${files.length} file(s) to import in ${this.inputDir}`);

    const results: ImportResult[] = [];
    for (const filePath of files) {
      results.push(await this.processFile(filePath));
    }

    const summary = this.createSummary(results, startTime, this.clock());
    this.logSummary(summary);
    return summary;
  }

  /**
   * Import a single file
   */
  async processFile(filePath: string): Promise<ImportResult> {
    const fileName = path.basename(filePath);
    let recordnum: number | null = null;

    try {
      const metadata = parseFieldMetadata(filePath);
      recordnum = metadata.recordnum;
      logger.info(`Processing ${fileName} (record ${recordnum})`);

      const file = await this.fileService.readJson(filePath, importFileSchema, `reading ${fileName}`);
      if (!file) {
        throw new Error(`${fileName} no longer exists`);
      }

      const header = await this.store.getHeader(recordnum);
      if (!header) {
        throw new DbError(`${recordnum} not found in tc_header table`);
      }
      const kind = COUNT_KIND_OF_IMPORT[file.kind];
      if (header.countKind !== kind) {
        throw new DbError(`${recordnum} is a ${header.countKind} count, not ${kind}`);
      }

      const { rowsWritten, dates } = await this.storeRows(metadata, file);
      await this.logEntry(recordnum, 'info', `Imported ${rowsWritten} rows from ${fileName}`);

      await this.store.saveHeader({
        ...header,
        importDataDate: today(this.clock),
        status: 'imported',
        counterId: metadata.counterId,
        speedLimit: metadata.speedLimit,
        representativeDate: determineDate(dates),
      });

      const problems: string[] = [];
      const aadv = await this.calculateAadv(recordnum, kind, problems);
      await this.checkData(recordnum, problems);

      if (this.cleanupFiles) {
        await this.fileService.deleteFile(filePath);
      }

      return { fileName, recordnum, success: true, rowsWritten, aadv, problems };
    } catch (error) {
      const errorMessage = formatError(error);
      logger.error(`Failed to import ${fileName}: ${errorMessage}`);
      if (recordnum !== null) {
        await this.tryLogEntry(recordnum, 'error', `Failed to import ${fileName}: ${errorMessage}`);
      }

      return {
        fileName,
        recordnum,
        success: false,
        rowsWritten: 0,
        aadv: null,
        problems: [],
        error: errorMessage,
      };
    }
  }

  /**
   * Bin, pivot and store the records of one file
   */
  private async storeRows(metadata: FieldMetadata, file: ImportFile): Promise<StoredRows> {
    const { recordnum } = metadata;

    switch (file.kind) {
      case 'individual-vehicle': {
        const vehicles: IndividualVehicle[] = file.records.map((record) => ({
          datetime: toDateTime(record.datetime),
          lane: record.lane,
          vehicleClass: vehicleClassFromCode(record.class),
          speed: record.speed,
        }));

        const { speedRangeCounts, vehicleClassCounts } = createSpeedAndClassCount(metadata, vehicles);
        const volCounts = createNonNormalVolCount(metadata, vehicles);
        const avgSpeedCounts = createNonNormalAvgSpeedCount(metadata, vehicles);

        await this.store.replaceClassAndSpeedCounts(recordnum, vehicleClassCounts, speedRangeCounts);
        await this.store.replaceNonNormalVolCounts(recordnum, volCounts);
        await this.store.replaceNonNormalAvgSpeedCounts(recordnum, avgSpeedCounts);

        return {
          rowsWritten:
            vehicleClassCounts.length + speedRangeCounts.length + volCounts.length + avgSpeedCounts.length,
          dates: vehicles.map(({ datetime }) => toDateString(datetime)),
        };
      }

      case 'fifteen-minute-vehicle': {
        const rows: FifteenMinuteVehicle[] = [];
        for (const record of file.records) {
          const direction = directionForLane(metadata.directions, record.lane);
          if (!direction) {
            logger.error(`Unable to determine direction of lane ${record.lane} for ${recordnum}`);
            continue;
          }
          rows.push({ datetime: toDateTime(record.datetime), count: record.count, direction, lane: record.lane });
        }

        await this.store.replaceFifteenMinuteVolumes(recordnum, rows);
        const volCounts = denormalizeVolCount(
          recordnum,
          await this.store.getBinnedVolumes(recordnum, 'fifteen-minute-volume'),
        );
        await this.store.replaceNonNormalVolCounts(recordnum, volCounts);

        return {
          rowsWritten: rows.length + volCounts.length,
          dates: rows.map(({ datetime }) => toDateString(datetime)),
        };
      }

      case 'bicycle':
      case 'pedestrian': {
        const rows = file.records.map((record) => ({
          datetime: toDateTime(record.datetime),
          total: record.total,
          incount: record.incount,
          outcount: record.outcount,
        }));
        await this.store.replaceBikePedCounts(recordnum, file.kind, rows);

        return {
          rowsWritten: rows.length,
          dates: rows.map(({ datetime }) => toDateString(datetime)),
        };
      }
    }
  }

  private async calculateAadv(recordnum: number, kind: CountKindName, problems: string[]): Promise<number | null> {
    try {
      const aadv = await this.aadvCalculator.insertAadv(recordnum, kind);
      if (aadv.size > 0) {
        await this.logEntry(recordnum, 'info', 'AADV calculated and inserted');
      }
      return aadv.get(null) ?? null;
    } catch (error) {
      const message = `Failed to calculate/insert AADV: ${formatError(error)}`;
      problems.push(message);
      await this.logEntry(recordnum, 'error', message);
      return null;
    }
  }

  private async checkData(recordnum: number, problems: string[]): Promise<void> {
    await this.logEntry(recordnum, 'info', 'Checking data');
    try {
      await this.dataChecker.check(recordnum);
    } catch (error) {
      const message = `An error occurred while checking data: ${formatError(error)}; warnings likely to be incomplete or incorrect.`;
      problems.push(message);
      await this.logEntry(recordnum, 'error', message);
    }
  }

  /**
   * Log a message for a record and append it to the record's import log
   */
  private async logEntry(recordnum: number, level: ImportLogLevel, message: string): Promise<void> {
    createRecordLogger(LOG_NAMESPACES.PROCESSOR, recordnum).log(level, message);
    await this.store.appendImportLog({ recordnum, datetime: this.clock().toISOString(), level, message });
  }

  /**
   * Import log entry for a record that may not exist
   */
  private async tryLogEntry(recordnum: number, level: ImportLogLevel, message: string): Promise<void> {
    try {
      await this.store.appendImportLog({ recordnum, datetime: this.clock().toISOString(), level, message });
    } catch (error) {
      logger.warn(`Could not write import log for ${recordnum}: ${formatError(error)}`);
    }
  }

  /**
   * Create an import summary from individual results
   */
  private createSummary(results: ImportResult[], startTime: Date, endTime: Date): ImportSummary {
    const successfulFiles = results.filter((r) => r.success).length;
    const failedFiles = results.filter((r) => !r.success).length;

    return {
      totalFiles: results.length,
      successfulFiles,
      failedFiles,
      results,
      startTime: startTime.toISOString(),
      endTime: endTime.toISOString(),
    };
  }

  /**
   * Log import summary
   */
  private logSummary(summary: ImportSummary): void {
    const duration = new Date(summary.endTime).getTime() - new Date(summary.startTime).getTime();
    logger.info(`Import complete in ${formatDuration(duration)}`);
    logger.info(`Successfully imported: ${summary.successfulFiles}/${summary.totalFiles} files`);

    if (summary.failedFiles > 0) {
      logger.error('Errors encountered:');
      summary.results
        .filter((r) => !r.success)
        .forEach((result) => {
          logger.error(`  - ${result.fileName}: ${result.error}`);
        });
    }

    const totalRows = summary.results.reduce((sum, r) => sum + r.rowsWritten, 0);
    logger.info(`Total rows written: ${totalRows}`);
  }
}
