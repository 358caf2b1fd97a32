/**
 * rasterkit CLI - BMP inspector and converter
 */

import { run } from './cli'

try {
	process.exitCode = run(process.argv.slice(2))
} catch (err) {
	console.error('Fatal error:', err)
	process.exitCode = 1
}
