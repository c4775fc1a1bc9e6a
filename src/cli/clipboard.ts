import { spawn } from "node:child_process";

export interface ClipboardCommand {
	command: string;
	args: string[];
}

export function clipboardCommand(
	platform: NodeJS.Platform = process.platform,
	env: NodeJS.ProcessEnv = process.env,
): ClipboardCommand {
	if (platform === "darwin") return { command: "pbcopy", args: [] };
	if (platform === "win32") return { command: "clip", args: [] };
	if (env.WAYLAND_DISPLAY) return { command: "wl-copy", args: [] };
	return { command: "xclip", args: ["-selection", "clipboard"] };
}

/** Pipe `text` into the platform's clipboard command. */
export function copyToClipboard(
	text: string,
	cmd: ClipboardCommand = clipboardCommand(),
): Promise<void> {
	return new Promise((resolve, reject) => {
		const proc = spawn(cmd.command, cmd.args, {
			stdio: ["pipe", "ignore", "pipe"],
		});
		let stderr = "";
		proc.stderr.setEncoding("utf-8");
		proc.stderr.on("data", (data: string) => {
			stderr += data;
		});
		proc.on("error", reject);
		proc.stdin.on("error", reject);
		proc.on("close", (code) => {
			if (code === 0) {
				resolve();
				return;
			}
			const detail = stderr.trim();
			reject(
				new Error(
					`${cmd.command} exited with code ${code}${detail ? `: ${detail}` : ""}`,
				),
			);
		});
		proc.stdin.end(text);
	});
}
