import * as fc from "fast-check";

fc.configureGlobal({
  numRuns: 100,
  verbose: false,
  endOnFailure: true,
  skipAllAfterTimeLimit: 20000,
});

export { fc };
