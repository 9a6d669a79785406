// cutshift/backend/src/cuts/cuts.controller.ts
import {
  Body,
  Controller,
  HttpException,
  HttpStatus,
  Logger,
  PayloadTooLargeException,
  Post,
  Res,
  StreamableFile,
  UploadedFile,
  UseGuards,
  UseInterceptors,
} from '@nestjs/common';
import { FileInterceptor } from '@nestjs/platform-express';
import { Throttle, ThrottlerGuard } from '@nestjs/throttler';
import * as path from 'path';
import { environment } from '../config/environment';
import { CutsService, ProcessedProject } from './cuts.service';
import { ProcessProjectDto } from './dto/process-project.dto';
import { eligibleCount, formatRunReport } from './run-report';

/** The part of the express response the controller writes to. */
export interface ResponseHeaders {
  setHeader(name: string, value: string): unknown;
}

export interface DryRunResponse {
  runId: string;
  outputName: string;
  cutType: string;
  offset: number;
  totalBoundaries: number;
  eligibleBoundaries: number;
  applied: number;
  skippedIneligible: number;
  skippedInfeasible: number;
  failed: number;
  lines: string[];
  sequences: { entryName: string; applied: number; total: number; skipped?: string }[];
}

@Controller()
export class CutsController {
  private readonly logger = new Logger(CutsController.name);

  constructor(private readonly cutsService: CutsService) {}

  /**
   * Apply J- or L-cuts to an uploaded project
   * POST /api/process
   * Form: file (.drp), cut_type (J|L), offset (frames), dry_run?
   */
  @Post('process')
  @UseGuards(ThrottlerGuard)
  @Throttle({ default: { limit: environment.rateLimit.limit, ttl: environment.rateLimit.ttl } })
  @UseInterceptors(
    // no storage configured: multer keeps the upload in memory
    FileInterceptor('file', {
      limits: { fileSize: environment.limits.maxFileSize },
    }),
  )
  processProject(
    @UploadedFile() file: Express.Multer.File | undefined,
    @Body() body: ProcessProjectDto,
    @Res({ passthrough: true }) res: ResponseHeaders,
  ): StreamableFile | DryRunResponse {
    if (!file) {
      throw new HttpException('No file uploaded', HttpStatus.BAD_REQUEST);
    }

    const extension = path.extname(file.originalname).toLowerCase();
    if (!environment.limits.allowedExtensions.includes(extension)) {
      throw new HttpException('Invalid file type. Only .drp files are allowed.', HttpStatus.BAD_REQUEST);
    }
    if (file.size > environment.limits.maxFileSize) {
      throw new PayloadTooLargeException(
        `File too large. Maximum size is ${Math.floor(environment.limits.maxFileSize / (1024 * 1024))}MB`,
      );
    }

    let result: ProcessedProject;
    try {
      result = this.cutsService.processArchive(file.buffer, file.originalname, {
        mode: body.cut_type,
        offsetFrames: body.offset,
        dryRun: body.dry_run === true,
      });
    } catch (error) {
      if (error instanceof HttpException) {
        throw error;
      }
      this.logger.error(
        `Processing ${file.originalname} failed: ${error instanceof Error ? error.message : String(error)}`,
        error instanceof Error ? error.stack : undefined,
      );
      throw new HttpException('Processing failed', HttpStatus.INTERNAL_SERVER_ERROR);
    }

    if (!result.archive) {
      return this.toDryRunResponse(result, body);
    }

    res.setHeader('X-Cuts-Applied', String(result.report.applied));
    res.setHeader('X-Total-Boundaries', String(eligibleCount(result.report)));
    res.setHeader('X-Cut-Type', body.cut_type);
    res.setHeader('X-Offset', String(body.offset));
    res.setHeader('X-Run-Id', result.runId);

    return new StreamableFile(result.archive, {
      type: 'application/zip',
      disposition: `attachment; filename="${result.outputName}"`,
      length: result.archive.length,
    });
  }

  private toDryRunResponse(result: ProcessedProject, body: ProcessProjectDto): DryRunResponse {
    const { report } = result;
    return {
      runId: result.runId,
      outputName: result.outputName,
      cutType: body.cut_type,
      offset: body.offset,
      totalBoundaries: report.total,
      eligibleBoundaries: eligibleCount(report),
      applied: report.applied,
      skippedIneligible: report.skippedIneligible,
      skippedInfeasible: report.skippedInfeasible,
      failed: report.failed,
      lines: formatRunReport(report),
      sequences: result.sequences.map((sequence) => ({
        entryName: sequence.entryName,
        applied: sequence.report.applied,
        total: sequence.report.total,
        ...(sequence.skipped ? { skipped: sequence.skipped } : {}),
      })),
    };
  }
}
