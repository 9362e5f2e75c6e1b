import fs from "node:fs";
import path from "node:path";
import { red, yellow } from "kleur/colors";
import { errorMessage } from "../errors";
import { type MetadataWriter, PngMetadataWriter } from "../metadata";
import { assertFolder } from "../scanner";
import { resolvePath } from "../utils";

export type DescriptionEntry = {
	filename: string;
	description?: string;
	error?: string;
};

/** Reads the description tag of every PNG directly inside `folder` */
export async function readDescriptions(
	folder: string,
	metadata: MetadataWriter = new PngMetadataWriter(),
): Promise<DescriptionEntry[]> {
	await assertFolder(folder);
	const names = (await fs.promises.readdir(folder))
		.filter((name) => name.toLowerCase().endsWith(".png") && !name.startsWith("."))
		.sort();

	const entries: DescriptionEntry[] = [];
	for (const filename of names) {
		try {
			entries.push({ filename, description: await metadata.read(path.join(folder, filename)) });
		} catch (error) {
			entries.push({ filename, error: errorMessage(error) });
		}
	}
	return entries;
}

export async function inspectCommand(folder: string): Promise<number> {
	const folderPath = path.resolve(resolvePath(folder) ?? folder);
	const entries = await readDescriptions(folderPath);

	for (const entry of entries) {
		const description = entry.error
			? red(`Unreadable: ${entry.error}`)
			: (entry.description ?? "No description found");
		console.log(`Image: ${yellow(entry.filename)}\nDescription: ${description}\n`);
	}
	return 0;
}
