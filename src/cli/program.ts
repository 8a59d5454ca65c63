import fs from "node:fs";
import { Command } from "commander";

function getVersion(): string {
	try {
		// package.json sits two levels up from both src/cli and dist/cli
		const raw = fs.readFileSync(new URL("../../package.json", import.meta.url), "utf-8");
		const pkg: unknown = JSON.parse(raw);
		if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
			return pkg.version;
		}
		return "0.0.0";
	} catch {
		return "0.0.0";
	}
}

export function createProgram(): Command {
	const program = new Command();

	program
		.name("postpace")
		.description("Paced, persona-driven posting scheduler")
		.version(getVersion())
		.option("-v, --verbose", "Enable verbose output")
		.option("-c, --config <path>", "Path to config file");

	return program;
}
