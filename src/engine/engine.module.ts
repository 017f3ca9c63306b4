import { Global, Module } from '@nestjs/common';
import { EngineStateService } from './engine-state.service.js';
import { CLOCK } from './constants.js';
import { systemClock } from './clock.js';

@Global()
@Module({
  providers: [EngineStateService, { provide: CLOCK, useValue: systemClock }],
  exports: [EngineStateService, CLOCK],
})
export class EngineModule {}
