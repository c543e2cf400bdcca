import { Transform, Type } from 'class-transformer';
import { IsBoolean, IsInt, IsOptional, Max, Min } from 'class-validator';
import { TickersDto } from './collect.dto';

const toBoolean = ({ value }: { value: unknown }): unknown => {
  if (value === 'true' || value === '1') return true;
  if (value === 'false' || value === '0') return false;
  return value;
};

export class SequencesQueryDto {
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(2)
  @Max(500)
  window?: number;

  @IsOptional()
  @Transform(toBoolean)
  @IsBoolean()
  labeled?: boolean;
}

export class NewsDatasetQueryDto extends TickersDto {
  @IsOptional()
  @Transform(toBoolean)
  @IsBoolean()
  requireLabels?: boolean;
}

export class RunsQueryDto {
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(500)
  limit?: number;
}
