// cutshift/backend/src/cuts/cuts.service.ts
import {
  BadRequestException,
  Injectable,
  InternalServerErrorException,
  Logger,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { v4 as uuidv4 } from 'uuid';
import { Environment } from '../config/environment';
import {
  ProjectArchive,
  ProjectArchiveError,
  getOutputName,
} from '../project-archive/project-archive';
import {
  ResolveSequence,
  SequenceParseError,
  isResolveSequence,
  parseResolveSequence,
  writeResolveSequence,
} from '../resolve/resolve-sequence';
import { detectBoundaries } from './boundary-detector';
import { TimelineStructureError } from './cuts.errors';
import { CutOptions, DetectedBoundary } from './cuts.types';
import { applyCuts } from './cut-transformer';
import {
  RunReport,
  eligibleCount,
  formatRunReport,
  mergeRunReports,
  summarizeResults,
} from './run-report';

export interface SequenceOutcome {
  entryName: string;
  report: RunReport;
  /** Set when the sequence could not be processed at all. */
  skipped?: string;
  changedClips: number;
}

export interface ProcessedProject {
  runId: string;
  outputName: string;
  /** Repacked archive; absent on a dry run. */
  archive?: Buffer;
  report: RunReport;
  sequences: SequenceOutcome[];
}

@Injectable()
export class CutsService {
  private readonly logger = new Logger(CutsService.name);

  constructor(private readonly configService: ConfigService<Environment, true>) {}

  /**
   * Applies J- or L-cuts to every timeline of a project archive.
   *
   * The archive is processed in memory; the input buffer is left as it is and
   * the result is a new archive. A run in which any boundary failed is
   * refused, since a failure means the parsed model is not trustworthy.
   */
  processArchive(buffer: Buffer, fileName: string, options: CutOptions): ProcessedProject {
    const runId = uuidv4();
    const limits = this.configService.get('limits', { infer: true });
    const { mediaExtent } = this.configService.get('resolve', { infer: true });

    this.logger.log(
      `[${runId}] Processing ${fileName} with ${options.mode}-cuts, offset=${options.offsetFrames}` +
        (options.dryRun ? ' (dry run)' : ''),
    );

    const archive = this.openArchive(buffer, limits.maxExtractedSize);
    const entryNames = archive
      .sequenceEntryNames()
      .filter((entryName) => isResolveSequence(archive.readText(entryName), entryName));

    if (entryNames.length === 0) {
      throw new BadRequestException('No timelines found in project file');
    }

    const sequences: SequenceOutcome[] = [];
    for (const entryName of entryNames) {
      const sequence = this.parseSequence(archive.readText(entryName), entryName, mediaExtent);
      const outcome = this.processSequence(sequence, options);

      if (outcome.xml !== undefined) {
        archive.writeText(entryName, outcome.xml);
      }
      sequences.push(outcome.summary);
    }

    const report = mergeRunReports(sequences.map((sequence) => sequence.report));
    for (const line of formatRunReport(report)) {
      this.logger.log(`[${runId}]   ${line}`);
    }

    if (eligibleCount(report) === 0) {
      throw new BadRequestException(
        'No eligible boundaries found in project. Audio and video edits must coincide at the cut.',
      );
    }

    const outputName = getOutputName(fileName, options.mode);
    if (options.dryRun) {
      return { runId, outputName, report, sequences };
    }

    if (report.suspect) {
      this.logger.error(`[${runId}] ${report.failed} boundaries failed; output withheld`);
      throw new InternalServerErrorException(
        `${report.failed} boundaries failed with an internal inconsistency; no output was written`,
      );
    }

    if (report.applied === 0) {
      throw new BadRequestException(
        `Could not apply ${options.mode}-cuts. Try a smaller offset or different cut type.`,
      );
    }

    this.logger.log(`[${runId}] Applied ${report.applied} ${options.mode}-cuts to ${fileName}`);
    return { runId, outputName, archive: archive.toBuffer(), report, sequences };
  }

  private processSequence(
    sequence: ResolveSequence,
    options: CutOptions,
  ): { summary: SequenceOutcome; xml?: string } {
    const { entryName } = sequence;

    let detected: DetectedBoundary[];
    try {
      detected = detectBoundaries(sequence.timeline);
    } catch (error) {
      if (error instanceof TimelineStructureError) {
        this.logger.warn(`Skipping ${entryName}: ${error.message}`);
        return {
          summary: { entryName, report: summarizeResults([]), skipped: error.message, changedClips: 0 },
        };
      }
      throw error;
    }

    const run = applyCuts(sequence.timeline, detected, options);
    const report = summarizeResults(run.results);
    this.logger.debug(
      `${entryName}: ${detected.length} boundaries, ${report.applied} ${options.dryRun ? 'feasible' : 'applied'}`,
    );

    if (options.dryRun || report.applied === 0) {
      return { summary: { entryName, report, changedClips: 0 } };
    }

    const { xml, changedClips } = writeResolveSequence(sequence, run.timeline);
    return { summary: { entryName, report, changedClips }, xml };
  }

  private openArchive(buffer: Buffer, maxExtractedSize: number): ProjectArchive {
    try {
      return ProjectArchive.open(buffer, { maxExtractedSize });
    } catch (error) {
      if (error instanceof ProjectArchiveError) {
        throw new BadRequestException(error.message);
      }
      throw error;
    }
  }

  private parseSequence(
    xml: string,
    entryName: string,
    mediaExtent: Environment['resolve']['mediaExtent'],
  ): ResolveSequence {
    try {
      return parseResolveSequence(xml, { entryName, mediaExtent });
    } catch (error) {
      if (error instanceof SequenceParseError) {
        throw new BadRequestException(`Unparsable timeline ${error.message}`);
      }
      throw error;
    }
  }
}
