import { spawn } from "node:child_process";

export interface CopyCommand {
  command: string;
  args: string[];
}

export function buildCopyCommand(platform: NodeJS.Platform, env: NodeJS.ProcessEnv): CopyCommand {
  if (platform === "darwin") {
    return { command: "pbcopy", args: [] };
  }
  if (platform === "win32") {
    return { command: "clip", args: [] };
  }
  if (env.WAYLAND_DISPLAY) {
    return { command: "wl-copy", args: [] };
  }
  return { command: "xclip", args: ["-selection", "clipboard"] };
}

async function pipeToCommand(command: string, args: string[], input: string): Promise<void> {
  await new Promise<void>((resolve, reject) => {
    const child = spawn(command, args, { stdio: ["pipe", "ignore", "ignore"] });
    child.once("error", reject);
    child.once("exit", (code) => {
      if (code === 0) {
        resolve();
        return;
      }
      reject(new Error(`command failed: ${command} (exit ${String(code)})`));
    });
    child.stdin.on("error", reject);
    child.stdin.end(input, "utf8");
  });
}

export async function copyToClipboard(text: string): Promise<void> {
  const { command, args } = buildCopyCommand(process.platform, process.env);
  await pipeToCommand(command, args, text);
}
