// cutshift/backend/src/project-archive/project-archive.ts
import AdmZip from 'adm-zip';
import { Logger } from '@nestjs/common';
import { CutMode } from '../cuts/cuts.types';

/**
 * A DaVinci Resolve project archive (.drp) is a ZIP file with a project.xml
 * at its root and one XML file per timeline under SeqContainer/.
 */

const logger = new Logger('ProjectArchive');

const PROJECT_FILE = 'project.xml';
const SEQUENCE_DIR = 'SeqContainer/';

export interface ArchiveLimits {
  /** Upper bound for the summed uncompressed size of all entries. */
  maxExtractedSize: number;
}

export class ProjectArchiveError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ProjectArchiveError';
  }
}

export class ProjectArchive {
  private constructor(private readonly zip: AdmZip) {}

  /**
   * Opens an archive held in memory. The buffer is only read; changes made
   * through writeText() end up in the buffer returned by toBuffer().
   */
  static open(buffer: Buffer, limits: ArchiveLimits): ProjectArchive {
    let zip: AdmZip;
    try {
      zip = new AdmZip(buffer);
    } catch (error) {
      logger.warn(`Rejected archive: ${error instanceof Error ? error.message : String(error)}`);
      throw new ProjectArchiveError('File is not a valid ZIP archive');
    }

    inspectEntries(zip, limits);
    return new ProjectArchive(zip);
  }

  get entryNames(): string[] {
    return this.zip.getEntries().map((entry) => entry.entryName);
  }

  /**
   * XML files directly inside SeqContainer/. Whether a file really holds a
   * timeline is decided by its root element, which the caller checks.
   */
  sequenceEntryNames(): string[] {
    return this.entryNames
      .filter((name) => name.startsWith(SEQUENCE_DIR))
      .filter((name) => {
        const rest = name.slice(SEQUENCE_DIR.length);
        return rest.length > 0 && !rest.includes('/') && rest.toLowerCase().endsWith('.xml');
      })
      .sort();
  }

  readText(entryName: string): string {
    const entry = this.zip.getEntry(entryName);
    if (!entry) {
      throw new ProjectArchiveError(`Archive has no entry ${entryName}`);
    }
    return entry.getData().toString('utf8');
  }

  writeText(entryName: string, text: string): void {
    if (!this.zip.getEntry(entryName)) {
      throw new ProjectArchiveError(`Archive has no entry ${entryName}`);
    }
    this.zip.updateFile(entryName, Buffer.from(text, 'utf8'));
  }

  toBuffer(): Buffer {
    return this.zip.toBuffer();
  }
}

function inspectEntries(zip: AdmZip, limits: ArchiveLimits): void {
  const entries = zip.getEntries();

  const totalSize = entries.reduce((sum, entry) => sum + entry.header.size, 0);
  if (totalSize > limits.maxExtractedSize) {
    throw new ProjectArchiveError(
      `Extracted size (${totalSize} bytes) exceeds maximum (${limits.maxExtractedSize} bytes)`,
    );
  }

  for (const entry of entries) {
    if (entry.entryName.includes('..') || entry.entryName.startsWith('/')) {
      throw new ProjectArchiveError(`Invalid file path in archive: ${entry.entryName}`);
    }
  }

  const names = entries.map((entry) => entry.entryName);
  if (!names.includes(PROJECT_FILE)) {
    throw new ProjectArchiveError(`Invalid DRP structure: missing ${PROJECT_FILE}`);
  }
  if (!names.some((name) => name.startsWith(SEQUENCE_DIR))) {
    throw new ProjectArchiveError(`Invalid DRP structure: missing ${SEQUENCE_DIR.slice(0, -1)} directory`);
  }
}

/**
 * Name of the archive written next to the original, e.g.
 * "Interview.drp" -> "Interview (J cuts added).drp".
 */
export function getOutputName(originalName: string, mode: CutMode): string {
  const parts = originalName.split(/[\\/]/);
  const fileName = parts[parts.length - 1];
  const lastDot = fileName.lastIndexOf('.');
  const stem = lastDot > 0 ? fileName.substring(0, lastDot) : fileName;

  return `${stem} (${mode} cuts added).drp`;
}
