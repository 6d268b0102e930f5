import { Module } from '@nestjs/common';
import { CODECOV_FETCH, CodecovSink } from './codecov.sink';
import type { FetchFn } from './codecov.sink';
import { COVERAGE_SINK } from './coverage-sink';

@Module({
  providers: [
    { provide: CODECOV_FETCH, useValue: ((input, init) => fetch(input, init)) satisfies FetchFn },
    CodecovSink,
    { provide: COVERAGE_SINK, useExisting: CodecovSink },
  ],
  exports: [COVERAGE_SINK],
})
export class CoverageModule {}
