// src/index.ts
import { red } from "kleur/colors";
import { createProgram } from "./cli";
import { AuditLogError, ConfigError } from "./errors";

// Main application function
async function main() {
	await createProgram().parseAsync(process.argv);
}

// Configuration and audit-log problems stop the run before any file is touched
main().catch((error: unknown) => {
	if (error instanceof ConfigError || error instanceof AuditLogError) {
		console.error(red(error.message));
	} else {
		console.error("An unexpected error occurred:", error);
	}
	process.exit(1);
});
