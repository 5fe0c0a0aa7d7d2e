#!/usr/bin/env node
import "dotenv/config";
import { parseArgs } from "node:util";
import { loadConfig } from "./config/env.js";
import { createAppContext, AppContext } from "./app.js";
import { describeIssues, notesRequestSchema } from "./domain/records.js";
import { errorMessage } from "./domain/errors.js";
import { listExportedNotes } from "./pipelines/exporting.js";
import { runSmokeTest } from "./services/smokeTest.js";

const USAGE = `Usage: verse-notes <command> [options]

Commands:
  ingest [--from <file>]     Copy scraped pages into data/raw
  parse                      Raw pages → clean verse records
  chunk                      Clean records → chunks
  index                      Embed chunks into the vector index
  status                     Show pipeline readiness
  browse [--verse <n>]       Print clean records
  generate-notes --topic <t> [--audience <a>] [--duration-min <n>]
                 [--style class|discourse] [--out <dir>] [--background]
  notes                      List exported notes, newest first
  jobs [--remove <id>]       List notes jobs or remove a finished one
  smoke-test                 Check each stage with canned input
`;

const OPTIONS = {
  from: { type: "string" },
  topic: { type: "string" },
  audience: { type: "string" },
  "duration-min": { type: "string" },
  style: { type: "string" },
  out: { type: "string" },
  background: { type: "boolean" },
  remove: { type: "string" },
  verse: { type: "string" },
  help: { type: "boolean", short: "h" },
} as const;

interface CliValues {
  from?: string;
  topic?: string;
  audience?: string;
  "duration-min"?: string;
  style?: string;
  out?: string;
  background?: boolean;
  remove?: string;
  verse?: string;
}

async function main(): Promise<number> {
  const { values, positionals } = parseArgs({
    options: OPTIONS,
    allowPositionals: true,
  });

  const [command] = positionals;
  if (!command || values.help) {
    process.stdout.write(USAGE);
    return values.help ? 0 : 1;
  }

  const app = await createAppContext(loadConfig());
  try {
    return await runCommand(app, command, values);
  } finally {
    await app.close();
  }
}

async function runCommand(app: AppContext, command: string, values: CliValues): Promise<number> {
  switch (command) {
    case "ingest":
      printJson(await app.pipeline.ingest(values.from));
      return 0;
    case "parse":
      printJson(await app.pipeline.parse());
      return 0;
    case "chunk":
      printJson(await app.pipeline.chunk());
      return 0;
    case "index":
      printJson(await app.pipeline.index());
      return 0;
    case "status":
      printJson(await app.pipeline.status());
      return 0;
    case "browse":
      printJson(await app.pipeline.browse(values.verse));
      return 0;
    case "generate-notes":
      return generateNotes(app, values);
    case "notes":
      printJson(await listExportedNotes(app.config.paths.outputsDir));
      return 0;
    case "jobs":
      if (values.remove) {
        printJson({ job_id: values.remove, removed: await app.jobs.remove(values.remove) });
      } else {
        printJson(await app.jobs.list());
      }
      return 0;
    case "smoke-test":
      return smokeTest(app);
    default:
      console.error(`Unknown command: ${command}\n`);
      process.stderr.write(USAGE);
      return 1;
  }
}

async function generateNotes(app: AppContext, values: CliValues): Promise<number> {
  const durationText = values["duration-min"];
  const parsed = notesRequestSchema.safeParse({
    topic: values.topic,
    audience: values.audience,
    duration: durationText === undefined ? undefined : Number(durationText),
    style: values.style,
  });
  if (!parsed.success) {
    console.error(`Invalid notes request: ${describeIssues(parsed.error)}`);
    return 1;
  }

  if (!values.background) {
    const savedPath = await app.generateAndExport(parsed.data, values.out);
    printJson({ result_path: savedPath });
    return 0;
  }

  if (values.out) {
    console.error("--out cannot be combined with --background; jobs save under the outputs directory.");
    return 1;
  }
  const jobId = await app.jobs.start(parsed.data);
  console.error(`Started job ${jobId}; waiting for it to finish`);
  const job = await app.jobs.settled(jobId);
  printJson(job);
  return job?.status === "done" ? 0 : 1;
}

async function smokeTest(app: AppContext): Promise<number> {
  const checks = await runSmokeTest({
    embedder: app.embedder,
    vectorStore: app.vectorStore,
    excerptMaxChars: app.config.excerptMaxChars,
  });

  for (const check of checks) {
    console.log(`${check.passed ? "PASS" : "FAIL"}  ${check.name.padEnd(10)} ${check.detail}`);
  }
  const allPassed = checks.every((check) => check.passed);
  console.log(allPassed ? "\nAll smoke tests passed." : "\nSome smoke tests failed.");
  return allPassed ? 0 : 1;
}

function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error(`Error: ${errorMessage(error)}`);
    process.exitCode = 1;
  });
