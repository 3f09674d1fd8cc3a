import { createCli } from "./cli";

const cli = createCli();
cli.parse(process.argv, { run: false });

if (cli.matchedCommand) {
  cli.runMatchedCommand().catch((e: unknown) => {
    console.error(e);
    process.exit(1);
  });
} else if (!cli.options.help) {
  cli.outputHelp();
  process.exitCode = 1;
}
