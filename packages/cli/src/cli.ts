import { run } from "./program";

process.exitCode = await run(process.argv.slice(2), {
  stdin: process.stdin,
  stdout: (text) => {
    process.stdout.write(text);
  },
  stderr: (text) => {
    process.stderr.write(text);
  },
  env: process.env,
});
