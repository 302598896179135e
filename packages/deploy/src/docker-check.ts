/**
 * Docker Availability Check
 */

import { execSync } from "node:child_process";

let dockerAvailable: boolean | null = null;

/**
 * Check if the Docker daemon is reachable. Cached for the process lifetime.
 */
export function isDockerAvailable(): boolean {
	if (dockerAvailable !== null) {
		return dockerAvailable;
	}

	try {
		execSync("docker info", { stdio: "ignore", timeout: 5000 });
		dockerAvailable = true;
	} catch {
		dockerAvailable = false;
	}

	return dockerAvailable;
}
