import { IsBoolean, IsIn, IsInt, IsOptional, Max, Min } from 'class-validator';
import { Transform, Type } from 'class-transformer';
import { environment } from '../../config/environment';
import { CUT_MODES, CutMode } from '../cuts.types';

const maxOffset = environment.limits.maxOffsetFrames;

/**
 * Form fields sent alongside the uploaded project archive.
 * Multipart fields arrive as strings and are converted here.
 */
export class ProcessProjectDto {
  @Transform(({ value }) => (typeof value === 'string' ? value.trim().toUpperCase() : value))
  @IsIn(CUT_MODES, { message: "cut_type must be 'J' or 'L'" })
  cut_type!: CutMode;

  @Type(() => Number)
  @IsInt({ message: 'offset must be a positive integer' })
  @Min(1, { message: 'offset must be a positive integer' })
  @Max(maxOffset, { message: `offset too large (max ${maxOffset} frames)` })
  offset!: number;

  @IsOptional()
  @Transform(({ value }) => value === true || value === 'true' || value === '1')
  @IsBoolean()
  dry_run?: boolean = false;
}
