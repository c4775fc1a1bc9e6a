import { readFileSync } from "node:fs";
import { build } from "esbuild";

const pkg: { version: string } = JSON.parse(
	readFileSync(new URL("../package.json", import.meta.url), "utf-8"),
);

try {
	await build({
		entryPoints: ["src/index.ts"],
		bundle: true,
		platform: "node",
		target: "node20",
		format: "esm",
		outfile: "dist/promptpipe.js",
		packages: "external",
		define: {
			__PACKAGE_VERSION__: JSON.stringify(pkg.version),
		},
	});
} catch (err) {
	console.error(err);
	process.exit(1);
}
