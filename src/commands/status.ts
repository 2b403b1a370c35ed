import { scanRunLogs, logsDir } from "../core/run-logger.js";
import { loadConfig } from "../core/config.js";

export async function status(): Promise<void> {
  const config = loadConfig();
  const stats = scanRunLogs();

  if (stats.runs === 0) {
    console.log("Runs: No reports parsed yet");
    console.log(`  Run: diskmark parse <file> or diskmark batch <folder>`);
  } else {
    console.log(`Runs: ${stats.runs} run${stats.runs !== 1 ? "s" : ""} (${logsDir()})`);
    console.log(
      `Reports: ${stats.reports} parsed, ${stats.measurements} result${stats.measurements !== 1 ? "s" : ""}`
    );

    const failures = Object.entries(stats.failures);
    if (failures.length > 0) {
      const parts = failures.map(([code, count]) => `${count} ${code}`);
      console.log(`Failures: ${parts.join(", ")}`);
    }
  }

  console.log();
  console.log(`Encoding: ${config.encoding}`);
  console.log(`Format: ${config.format}${config.legacy ? " (legacy grammar)" : ""}`);
}
