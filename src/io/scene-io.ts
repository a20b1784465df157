import * as fs from 'fs/promises';
import * as path from 'node:path';
import { z } from 'zod';
import { type Scene } from '../types/scene.js';
import { isAxisAlignedRect } from '../types/shape.js';
import * as errors from '../errors.js';

export const SCENE_FILE_VERSION = '1.0';

const pointSchema = z.tuple([z.number().finite(), z.number().finite()]);
const colorSchema = z.tuple([
  z.number().int().min(0).max(255),
  z.number().int().min(0).max(255),
  z.number().int().min(0).max(255),
  z.number().int().min(0).max(255),
]);

const hitboxSchema = z
  .object({
    kind: z.enum(['polygon', 'rect', 'circle']),
    coords: z.array(pointSchema),
    translation: pointSchema,
    anchor: pointSchema,
    angle: z.number().finite(),
  })
  .refine((h) => h.kind !== 'rect' || isAxisAlignedRect(h.coords), {
    message: errors.rectNotAxisAligned().content[0].text,
    path: ['coords'],
  });

/**
 * On-disk scene file: the Scene plus the envelope fields.
 */
export const sceneFileSchema = z.object({
  hitboxmcp_version: z.string(),
  name: z.string(),
  created: z.string().optional(),
  modified: z.string().optional(),
  defaults: z
    .object({
      sacrifice_mtv: z.boolean().optional(),
      render_scale: z.number().int().min(1).optional(),
      background: colorSchema.optional(),
    })
    .optional(),
  hitboxes: z.array(
    z.object({
      name: z.string().min(1),
      color: colorSchema,
      hitbox: hitboxSchema,
    }),
  ),
});

export type SceneFileEnvelope = z.infer<typeof sceneFileSchema>;

function isErrnoException(e: unknown): e is NodeJS.ErrnoException {
  return e instanceof Error && 'code' in e;
}

/**
 * Loads a scene from a JSON file.
 * Validates the structure and strips the envelope fields (version, timestamps).
 *
 * @returns The Scene plus the stored `created` timestamp, if any
 */
export async function loadSceneFile(filePath: string): Promise<{ scene: Scene; created?: string }> {
  let fileContent: string;
  try {
    fileContent = await fs.readFile(filePath, 'utf8');
  } catch (error: unknown) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      throw new Error(errors.sceneFileNotFound(filePath).content[0].text);
    }
    throw error;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(fileContent);
  } catch (e: unknown) {
    throw new Error(`Invalid JSON in scene file: ${filePath}. ${errors.messageOf(e)}`);
  }

  const result = sceneFileSchema.safeParse(parsed);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new Error(
      `File ${filePath} does not match the required Scene format (${issue.path.join('.') || '<root>'}: ${issue.message}).`,
    );
  }

  const { hitboxmcp_version: _version, created, modified: _modified, ...scene } = result.data;
  return { scene, created };
}

/**
 * Saves a scene to a JSON file, creating parent directories as needed.
 *
 * @param existingCreated - Creation timestamp to preserve; defaults to now
 * @returns The `created` timestamp written
 */
export async function saveSceneFile(filePath: string, scene: Scene, existingCreated?: string): Promise<string> {
  const now = new Date().toISOString();
  const created = existingCreated ?? now;
  const envelope: SceneFileEnvelope = {
    hitboxmcp_version: SCENE_FILE_VERSION,
    created,
    modified: now,
    ...scene,
  };

  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, JSON.stringify(envelope, null, 2), 'utf8');
  return created;
}
