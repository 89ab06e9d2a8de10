import { spawn } from "node:child_process";

export interface OpenCommand {
  command: string;
  args: string[];
}

export function buildOpenCommand(platform: NodeJS.Platform, target: string): OpenCommand {
  if (platform === "darwin") {
    return { command: "open", args: [target] };
  }
  if (platform === "win32") {
    return { command: "cmd", args: ["/c", "start", "", target] };
  }
  return { command: "xdg-open", args: [target] };
}

export async function runCommand(command: string, args: string[]): Promise<void> {
  await new Promise<void>((resolve, reject) => {
    const child = spawn(command, args, { stdio: "ignore" });
    child.once("error", reject);
    child.once("exit", (code) => {
      if (code === 0) {
        resolve();
        return;
      }
      reject(new Error(`command failed: ${command} ${args.join(" ")} (exit ${String(code)})`));
    });
  });
}

/** Opens a URL or a file with the desktop's default handler. */
export async function openExternal(target: string): Promise<void> {
  const { command, args } = buildOpenCommand(process.platform, target);
  await runCommand(command, args);
}
