/**
 * Raised by an output device that could not publish a frame. The renderer
 * passes it to its caller as is and the frame loop stops on it.
 */
export class DeviceError extends Error {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = "DeviceError";
	}
}

export class ConfigError extends Error {
	constructor(public readonly issues: string[]) {
		super(`Config: invalid configuration (${issues.join("; ")})`);
		this.name = "ConfigError";
	}
}
