import { Global, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { PipelineConfig } from '../../config/configuration';
import { TradingCalendar } from './trading-calendar';

@Global()
@Module({
  providers: [
    {
      provide: TradingCalendar,
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => {
        const { calendar } = configService.getOrThrow<PipelineConfig>('pipeline');
        return new TradingCalendar({
          extraClosures: calendar.extraClosures,
          maxHorizonDays: calendar.maxHorizonDays,
        });
      },
    },
  ],
  exports: [TradingCalendar],
})
export class CalendarModule {}
