import { runCli } from "@/lib/cli/analyze";

runCli(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (e: unknown) => {
    console.error("[analyze] unexpected failure:", e);
    process.exitCode = 1;
  }
);
