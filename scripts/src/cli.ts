/**
 * netpulse command line.
 *
 * Usage:
 *   tsx src/cli.ts probe http example.com --path /healthz --tls
 *   tsx src/cli.ts status --url http://localhost:5000 --api-key <key>
 */
import "dotenv/config";
import { Command } from "commander";
import { probeCommand, statusCommand, type ProbeCommandOptions, type StatusCommandOptions } from "./commands.js";

const program = new Command();

program.name("netpulse").description("Network probing and status aggregation").version("1.0.0");

program
  .command("probe")
  .description("Run one probe and print the result")
  .argument("<protocol>", "tcp, http or icmp")
  .argument("<host>", "hostname or IP address")
  .argument("[port]", "port (required for tcp)")
  .option("--timeout <ms>", "probe timeout in milliseconds", "5000")
  .option("--path <path>", "HTTP request path")
  .option("--tls", "use https", false)
  .action(async (protocol: string, host: string, port: string | undefined, opts: ProbeCommandOptions) => {
    process.exitCode = await probeCommand(protocol, host, port, opts);
  });

program
  .command("status")
  .description("Print target status from a running server")
  .option("--url <url>", "server base URL", process.env["NETPULSE_URL"] ?? "http://localhost:5000")
  .option("--api-key <key>", "x-internal-api-key value", process.env["INTERNAL_API_KEY"])
  .action(async (opts: StatusCommandOptions) => {
    process.exitCode = await statusCommand(opts);
  });

program.parseAsync().catch((err: unknown) => {
  console.error(err);
  process.exit(1);
});
