import { spawn } from "child_process";
import { RenderError } from "accuracy-core";

/** Argv prefix that opens an image and waits for the viewer to close. */
export function viewerCommand(platform: NodeJS.Platform = process.platform): string[] {
  switch (platform) {
    case "darwin": return ["open", "-W"];
    case "win32":  return ["cmd", "/c", "start", "/wait", ""];
    default:       return ["xdg-open"];
  }
}

export function openViewer(file: string, command: readonly string[] = viewerCommand()): Promise<void> {
  const [cmd, ...args] = command;
  if (!cmd) return Promise.reject(new RenderError(file, "empty viewer command"));

  return new Promise((resolve, reject) => {
    const child = spawn(cmd, [...args, file], { stdio: "ignore" });

    child.on("error", (err) => {
      reject(new RenderError(file, `viewer '${cmd}' failed to start: ${err.message}`));
    });

    child.on("close", (code) => {
      if (code === 0) resolve();
      else reject(new RenderError(file, `viewer '${cmd}' exited with code ${code}`));
    });
  });
}
