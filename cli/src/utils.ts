import chalk from "chalk";
import { InitError } from "@ryzen-dash/monitor";

export function describeError(error: Error): string {
  if (error instanceof InitError && error.reason === "smu_unavailable") {
    return `${error.message}\nAre you running as root?`;
  }
  return error.message;
}

export function handleError(error: Error): never {
  console.error(chalk.red("Error:"), describeError(error));
  process.exit(1);
}

// Privileged reads fail later in init; this is only a hint
export function warnIfUnprivileged(
  uid: number | undefined = process.geteuid?.()
): boolean {
  if (uid === undefined || uid === 0) {
    return false;
  }
  console.error(
    chalk.yellow(
      "Warning: reading SMU telemetry needs root privileges. Please run with sudo."
    )
  );
  return true;
}

export function setupSignalHandler(onSignal: () => void): {
  cleanup: () => void;
} {
  let handled = false;

  const handleSignal = () => {
    if (!handled) {
      handled = true;
      onSignal();
    }
  };

  process.on("SIGINT", handleSignal);
  process.on("SIGTERM", handleSignal);

  return {
    cleanup: () => {
      process.off("SIGINT", handleSignal);
      process.off("SIGTERM", handleSignal);
    },
  };
}
