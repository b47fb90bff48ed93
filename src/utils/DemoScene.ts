import { d2r } from "../maths/Common";
import { Point } from "../maths/Point";
import { Transform } from "../maths/Transform";
import { Triangle } from "../maths/Triangle";
import type { FrameCallback } from "../core/FrameLoop";
import type { RasterConfig } from "../core/Config";

/**
 * Draw callback for the demo: a triangle spinning about the screen center
 * under an orbiting light, a fixed line from the top-left corner and a
 * point near the bottom-right corner.
 */
export function createDemoScene(config: RasterConfig): FrameCallback {
	const { width, height, targetFps } = config;

	// Modeled one unit in front of the origin so the face points at the viewer.
	const triangle = new Triangle(
		new Point(0, -6, 1),
		new Point(-6, 5, 1),
		new Point(6, 5, 1)
	);
	const center = Transform.translate({ x: width / 2, y: height / 2, z: 0 });
	const marker = new Point(width - 4, height - 4, 0);

	return (r, { frame }) => {
		// Half a turn per second.
		const angle = d2r((frame * 180) / targetFps);
		r.setLightPos({
			x: 10 * Math.cos(angle),
			y: 10 * Math.sin(angle),
			z: -10,
		});
		r.withTransform(Transform.rotateZ(angle).compose(center), (scoped) =>
			scoped.fillTriangle(triangle)
		);
		r.drawLine({ x: 0, y: 0, z: 0 }, { x: 5, y: 3, z: 0 });
		r.drawPoint(marker);
	};
}
