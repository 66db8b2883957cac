import { z } from "zod";
import { MaterialType } from "../materials/Material";

const finite = z.number().finite();

const vec3Schema = z.union([
	z.object({ x: finite, y: finite, z: finite }),
	z.tuple([finite, finite, finite]).transform(([x, y, z]) => ({ x, y, z })),
]);

const vec2Schema = z.union([
	z.object({ x: finite, y: finite }),
	z.tuple([finite, finite]).transform(([x, y]) => ({ x, y })),
]);

const channel = finite.min(0);

/** `{ r, g, b }`, `[r, g, b]` or a single grey level, all linear. */
const colorSchema = z.union([
	z.object({ r: channel, g: channel, b: channel }),
	z.tuple([channel, channel, channel]).transform(([r, g, b]) => ({ r, g, b })),
	channel.transform((v) => ({ r: v, g: v, b: v })),
]);

const materialSchema = z
	.object({
		type: z.nativeEnum(MaterialType).optional(),
		ior: finite.positive().optional(),
		kd: channel.optional(),
		ks: channel.optional(),
		diffuseColor: colorSchema.optional(),
		specularExponent: channel.optional(),
	})
	.strict();

const sphereSchema = z
	.object({
		type: z.literal("sphere"),
		center: vec3Schema,
		radius: finite.positive(),
		material: materialSchema.optional(),
	})
	.strict();

const meshSchema = z
	.object({
		type: z.literal("mesh"),
		vertices: z.array(vec3Schema).min(3),
		indices: z.array(z.number().int().nonnegative()).min(3),
		st: z.array(vec2Schema),
		material: materialSchema.optional(),
	})
	.strict();

const planeSchema = z
	.object({
		type: z.literal("plane"),
		center: vec3Schema,
		width: finite.positive(),
		depth: finite.positive(),
		material: materialSchema.optional(),
	})
	.strict();

const objSchema = z
	.object({
		type: z.literal("obj"),
		/** Resolved against the scene file's directory. */
		path: z.string().min(1),
		material: materialSchema.optional(),
	})
	.strict();

const objectSchema = z.discriminatedUnion("type", [
	sphereSchema,
	meshSchema,
	planeSchema,
	objSchema,
]);

const lightSchema = z
	.object({
		type: z.literal("point"),
		position: vec3Schema,
		color: colorSchema.optional(),
		intensity: channel.optional(),
	})
	.strict();

export const settingsSchema = z
	.object({
		width: z.number().int().positive(),
		height: z.number().int().positive(),
		fov: finite.gt(0).lt(180),
		maxDepth: z.number().int().nonnegative(),
		epsilon: finite.positive(),
		backgroundColor: colorSchema,
	})
	.partial()
	.strict();

export const sceneSchema = z
	.object({
		settings: settingsSchema.default({}),
		objects: z.array(objectSchema).default([]),
		lights: z.array(lightSchema).default([]),
	})
	.strict();

export type ObjectDescription = z.infer<typeof objectSchema>;
export type SceneDescription = z.infer<typeof sceneSchema>;
