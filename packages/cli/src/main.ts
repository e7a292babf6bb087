import { run } from './cli';

run(process.argv.slice(2), {
  stdout: (line) => console.log(line),
  stderr: (line) => console.error(line),
})
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error('[strata] Fatal:', error);
    process.exitCode = 1;
  });
