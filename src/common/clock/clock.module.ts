import { Global, Module } from '@nestjs/common';
import { CLOCK, RANDOM_SOURCE, SystemClock } from './clock';

@Global()
@Module({
  providers: [
    { provide: CLOCK, useClass: SystemClock },
    { provide: RANDOM_SOURCE, useValue: Math.random },
  ],
  exports: [CLOCK, RANDOM_SOURCE],
})
export class ClockModule {}
