import { IsNumber, IsOptional, IsPositive, Max } from 'class-validator';

/** Any ratio left out keeps its configured value. */
export class SplitDto {
  @IsOptional()
  @IsNumber()
  @IsPositive()
  @Max(1)
  train?: number;

  @IsOptional()
  @IsNumber()
  @IsPositive()
  @Max(1)
  val?: number;

  @IsOptional()
  @IsNumber()
  @IsPositive()
  @Max(1)
  test?: number;
}
