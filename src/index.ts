export { Vector2 } from "./maths/Vector2";
export { Vector3 } from "./maths/Vector3";
export { Ray } from "./maths/Ray";
export * from "./maths/Common";
export * from "./maths/types";
export * from "./utils/Color";
export type {
	SceneObject,
	Intersection,
	HitPayload,
	SurfaceProperties,
} from "./core/types";
export { Scene, type SceneParams } from "./core/Scene";
export { Renderer, type RenderProgress, type RendererEvents } from "./core/Renderer";
export { FrameBuffer } from "./core/FrameBuffer";
export { EventEmitter, type Listener } from "./core/EventEmitter";
export { trace } from "./core/Tracer";
export { reflect, refract, fresnel } from "./core/Optics";
export { castRay } from "./core/Shading";
export { SceneConfigError, ImageWriteError } from "./core/Errors";
export { CoreConstants, SceneDefaults, CheckerConstants } from "./core/Constants";
export { Camera } from "./cameras/Camera";
export { Material, MaterialType, type MaterialParams } from "./materials";
export * from "./lights";
export { Sphere } from "./models/Sphere";
export { MeshTriangle } from "./models/MeshTriangle";
export { ModelFactory } from "./models/ModelFactory";
export { PhongStrategy } from "./shaders/PhongStrategy";
export type { ILightingStrategy, ShadingOptions, SurfaceHit } from "./shaders/types";
export { Loader, type LoaderEvents } from "./loaders/Loader";
export { SceneLoader } from "./loaders/SceneLoader";
export { OBJLoader } from "./loaders/OBJLoader";
export { sceneSchema, type SceneDescription } from "./loaders/SceneSchema";
export { PPMWriter } from "./writers/PPMWriter";
