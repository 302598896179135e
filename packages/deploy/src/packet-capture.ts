/**
 * Packet Capture
 *
 * Optional tcpdump side-process attached to a deployment. Stopped with SIGINT so
 * tcpdump flushes the capture file before exiting.
 */

import { type ChildProcess, spawn } from "node:child_process";

export interface PacketCaptureOptions {
	/** Host ports to capture */
	ports: number[];
	/** Capture file (default: "test.pcap") */
	outputFile?: string;
	/** Executable (default: "tcpdump") */
	command?: string;
	/** Time to wait for exit after SIGINT before SIGKILL (default: 5000) */
	stopTimeoutMs?: number;
}

export interface PacketCapture {
	readonly pid: number | undefined;
	readonly args: string[];
	/** @returns exit code, or null if the process was killed by a signal */
	stop(): Promise<number | null>;
}

/**
 * Build the tcpdump argument list for the given ports
 */
export function packetCaptureArgs(ports: number[], outputFile: string): string[] {
	const filter = `tcp port ${ports.join(" or port ")}`;
	return ["-i", "any", "-s", "0", filter, "-w", outputFile];
}

function waitForExit(child: ChildProcess): Promise<number | null> {
	return new Promise((resolve) => {
		if (child.exitCode !== null || child.signalCode !== null) {
			resolve(child.exitCode);
			return;
		}
		child.once("exit", (code) => resolve(code));
	});
}

/**
 * Start capturing. Rejects if the executable cannot be spawned.
 */
export async function startPacketCapture(options: PacketCaptureOptions): Promise<PacketCapture> {
	if (options.ports.length === 0) {
		throw new Error("Packet capture needs at least one port");
	}
	const command = options.command ?? "tcpdump";
	const args = packetCaptureArgs(options.ports, options.outputFile ?? "test.pcap");
	const stopTimeoutMs = options.stopTimeoutMs ?? 5000;

	const child = spawn(command, args, { stdio: "ignore" });
	await new Promise<void>((resolve, reject) => {
		child.once("spawn", () => resolve());
		child.once("error", reject);
	});
	console.log(`[PacketCapture] started ${command} ${args.join(" ")} (pid ${child.pid})`);

	let stopped: Promise<number | null> | undefined;
	return {
		pid: child.pid,
		args,
		stop(): Promise<number | null> {
			if (stopped) {
				return stopped;
			}
			stopped = (async () => {
				const exited = waitForExit(child);
				child.kill("SIGINT");
				const timer = setTimeout(() => child.kill("SIGKILL"), stopTimeoutMs);
				const code = await exited;
				clearTimeout(timer);
				console.log(`[PacketCapture] ${command} exited with code ${code}`);
				return code;
			})();
			return stopped;
		},
	};
}
