import { FrameLoop, Renderer, TextScreen } from "./index";
import { createDemoScene } from "./utils/DemoScene";
import { parseDemoArgs } from "./utils/DemoArgs";

async function main(): Promise<void> {
	const options = parseDemoArgs(process.argv.slice(2));
	const { width, height, targetFps } = options.config;

	const screen = new TextScreen({
		width,
		height,
		clearScreen: options.clearScreen,
	});
	const renderer = new Renderer(screen, { color: options.color });

	const loop = new FrameLoop(
		renderer,
		createDemoScene(options.config),
		{ targetFps, maxFrames: options.frames }
	);

	loop.on("frameend", ({ frame, elapsed }) => {
		if (elapsed > loop.budget) {
			const budget = loop.budget.toFixed(1);
			console.warn(
				`softraster: frame ${frame} took ${elapsed.toFixed(1)}ms ` +
					`(budget ${budget}ms)`
			);
		}
	});

	const controller = new AbortController();
	process.once("SIGINT", () => controller.abort());

	const frames = await loop.run(controller.signal);
	console.log(`softraster: rendered ${frames} frame(s)`);
}

main().catch((error: unknown) => {
	console.error("softraster: failed to render:", error);
	process.exitCode = 1;
});
