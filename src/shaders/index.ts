export { FlatLitShader } from "./FlatLitShader";
export { UnlitShader } from "./UnlitShader";
export { computeLightIntensity } from "./Lighting";
export type { IShader } from "./types";
