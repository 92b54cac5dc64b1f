import { loadConfig } from "./config";
import { ConfigError } from "./core/errors";
import { runDemo } from "./demo";
import { makeLogger } from "./logging";

const main = () => {
  const cfg = loadConfig();
  const log = makeLogger(cfg.logLevel);
  const r = runDemo(cfg, { logger: log });
  log.info(
    {
      batchId: String(r.batchId),
      requestId: String(r.requestId),
      totalSalary: String(r.totalSalary),
      totalBonus: String(r.totalBonus),
      root: r.root,
    },
    "payroll round finalized",
  );
};

try {
  main();
} catch (err) {
  const log = makeLogger();
  if (err instanceof ConfigError) log.error({ issues: err.issues }, "invalid configuration");
  else log.error({ err }, "payroll round failed");
  process.exitCode = 1;
}
