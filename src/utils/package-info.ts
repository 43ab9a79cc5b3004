import fs from 'fs-extra'
import path from 'path'
import { z } from 'zod'

const PackageInfoSchema = z.object({
	name: z.string(),
	version: z.string(),
	description: z.string().default(''),
})

export type PackageInfo = z.infer<typeof PackageInfoSchema>

/**
 * Read name, version and description from the nearest package.json above a file
 * @param fromFile Absolute path of a module inside the package (usually the CLI entry)
 * @throws Error if no package.json is found or it lacks a name or version
 */
export function getPackageInfo(fromFile: string): PackageInfo {
	let dir = path.dirname(fromFile)

	for (;;) {
		const candidate = path.join(dir, 'package.json')
		if (fs.pathExistsSync(candidate)) {
			const result = PackageInfoSchema.safeParse(fs.readJsonSync(candidate))
			if (!result.success) {
				throw new Error(`Invalid package.json at ${candidate}: ${result.error.issues[0]?.message ?? 'unknown error'}`)
			}
			return result.data
		}

		const parent = path.dirname(dir)
		if (parent === dir) {
			throw new Error(`package.json not found above ${fromFile}`)
		}
		dir = parent
	}
}
