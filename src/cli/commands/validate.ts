import pc from "picocolors";
import { validateFileFormat } from "../../media/format";
import { createTerminalNotifier } from "../../platform";
import { loadCommandConfig } from "./context";

export function runValidate(files: string[], options: { config?: string }): void {
  const config = loadCommandConfig(options.config);
  if (!config) {
    return;
  }
  const notifier = createTerminalNotifier(config);
  let rejected = 0;
  for (const file of files) {
    const allowed = validateFileFormat(file, notifier);
    notifier.settle();
    if (allowed) {
      console.log(`${pc.green("✓")} ${file}`);
    } else {
      rejected += 1;
      console.log(`${pc.red("✗")} ${file}`);
    }
  }
  if (rejected > 0) {
    process.exitCode = 1;
  }
}
