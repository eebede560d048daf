import { Global, Module } from '@nestjs/common';

/**
 * Source of the current time in epoch milliseconds. Injected so window
 * rollover and token issuance can be driven from tests.
 */
export interface Clock {
  now(): number;
}

export const CLOCK = Symbol('CLOCK');

export const systemClock: Clock = {
  now: () => Date.now(),
};

@Global()
@Module({
  providers: [{ provide: CLOCK, useValue: systemClock }],
  exports: [CLOCK],
})
export class ClockModule {}
