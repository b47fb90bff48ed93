export { Point } from "./maths/Point";
export { Transform } from "./maths/Transform";
export { Triangle, type FlatTriangle } from "./maths/Triangle";
export * from "./maths/Common";
export type * from "./maths/types";
export * from "./utils/Color";
export { FrameBuffer } from "./core/FrameBuffer";
export { Rasterizer, type RasterizerLike } from "./core/Rasterizer";
export {
	Renderer,
	type RendererOptions,
	type RendererEvents,
} from "./core/Renderer";
export {
	FrameLoop,
	type FrameCallback,
	type FrameInfo,
	type FrameEndInfo,
	type FrameLoopEvents,
	type FrameLoopOptions,
	type Sleep,
	type StopReason,
} from "./core/FrameLoop";
export { EventEmitter, type Listener } from "./core/EventEmitter";
export {
	DEFAULT_CONFIG,
	resolveConfig,
	frameDuration,
	type RasterConfig,
} from "./core/Config";
export {
	CoreConstants,
	RenderConstants,
	FrameConstants,
} from "./core/Constants";
export { DeviceError, ConfigError } from "./core/Errors";
export type { DrawContext, OutputDevice } from "./core/types";
export * from "./shaders";
export {
	TextScreen,
	formatFrame,
	type TextScreenOptions,
} from "./devices/TextScreen";
export { MemoryDevice } from "./devices/MemoryDevice";
export { parseDemoArgs, type DemoOptions } from "./utils/DemoArgs";
export { createDemoScene } from "./utils/DemoScene";
