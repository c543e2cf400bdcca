import { Transform, Type } from 'class-transformer';
import { ArrayMaxSize, IsArray, IsInt, IsOptional, IsString, Matches, Max, Min } from 'class-validator';

const TICKER_PATTERN = /^[A-Za-z.\-]{1,10}$/;

export const toTickerList = ({ value }: { value: unknown }): unknown => {
  if (typeof value === 'string') {
    return value
      .split(',')
      .map((ticker) => ticker.trim())
      .filter(Boolean);
  }
  return value;
};

export class TickersDto {
  @IsOptional()
  @Transform(toTickerList)
  @IsArray()
  @ArrayMaxSize(500)
  @IsString({ each: true })
  @Matches(TICKER_PATTERN, { each: true, message: 'each ticker must be 1-10 letters' })
  tickers?: string[];
}

export class CollectDto extends TickersDto {
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(3650)
  days?: number;
}
