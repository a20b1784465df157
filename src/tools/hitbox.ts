import { z } from 'zod';
import { type McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { getWorkspace } from '../classes/workspace.js';
import { HitboxClass } from '../classes/hitbox.js';
import { type SceneClass } from '../classes/scene.js';
import { TransformCommand } from '../commands/transform-command.js';
import { AddHitboxCommand, RemoveHitboxCommand, RenameHitboxCommand, SetColorCommand } from '../commands/scene-edit-command.js';
import { type Color, resolveColor } from '../types/color.js';
import { type Point2D } from '../types/shape.js';
import * as errors from '../errors.js';
import { caughtError, jsonResult } from './respond.js';

const point = z.tuple([z.number(), z.number()]);

/**
 * Zod input schema for the `hitbox` tool.
 */
const hitboxInputSchema = {
  action: z
    .enum([
      'create_rect', 'create_polygon', 'create_circle', 'delete', 'rename', 'info', 'list',
      'move_to', 'set_anchor', 'set_angle', 'resize', 'set_radius', 'set_color',
    ])
    .describe('Hitbox action to perform'),
  name: z.string().optional().describe('Hitbox name (required by every action except list)'),
  new_name: z.string().optional().describe('New name for rename'),
  x: z.number().optional().describe('x for create_rect (bottom-left) and move_to'),
  y: z.number().optional().describe('y for create_rect (bottom-left) and move_to'),
  width: z.number().optional().describe('Rect width for create_rect/resize'),
  height: z.number().optional().describe('Rect height for create_rect/resize'),
  points: z.array(point).optional().describe('Convex polygon vertices [[x, y], ...] for create_polygon'),
  center: point.optional().describe('Circle center [x, y] for create_circle'),
  radius: z.number().optional().describe('Circle radius for create_circle/set_radius'),
  anchor: point.optional().describe('Anchor (rotation pivot) [x, y] in the local frame'),
  anchor_x: z.number().optional().describe('Anchor x only, for set_anchor'),
  anchor_y: z.number().optional().describe('Anchor y only, for set_anchor'),
  angle: z.number().optional().describe('Rotation for set_angle, radians unless degrees is true'),
  degrees: z.boolean().optional().describe('Interpret angle in degrees'),
  color: z
    .union([z.string(), z.array(z.number().int())])
    .optional()
    .describe('Render color: name (RED, WHITE, ...) or [r, g, b, a]'),
};

/**
 * Registers the `hitbox` tool on the MCP server.
 */
export function registerHitboxTool(server: McpServer): void {
  server.registerTool(
    'hitbox',
    {
      title: 'Hitbox',
      description:
        'Create and transform convex hitboxes (rect, polygon, circle). Actions: create_rect, create_polygon, create_circle, delete, rename, info, list, move_to, set_anchor, set_angle, resize, set_radius, set_color. Edits are undoable.',
      inputSchema: hitboxInputSchema,
    },
    (args) => {
      const workspace = getWorkspace();
      const scene = workspace.scene;
      if (!scene) {
        return errors.noSceneLoaded();
      }

      if (args.action === 'list') {
        return jsonResult({ hitboxes: scene.names().map((n) => describeHitbox(scene, n)) });
      }

      if (!args.name) {
        return errors.invalidArgument(`hitbox ${args.action} requires "name".`);
      }
      const name = args.name;

      switch (args.action) {
        case 'create_rect':
        case 'create_polygon':
        case 'create_circle':
          return handleCreate(workspace, scene, name, args);
        case 'delete':
          return handleDelete(workspace, scene, name);
        case 'rename':
          return handleRename(workspace, scene, name, args.new_name);
        case 'info':
          if (!scene.has(name)) return errors.hitboxNotFound(name);
          return jsonResult(describeHitbox(scene, name));
        case 'set_color':
          return handleSetColor(workspace, scene, name, args.color);
        case 'move_to':
        case 'set_anchor':
        case 'set_angle':
        case 'resize':
        case 'set_radius':
          return handleTransform(workspace, scene, name, args);
        default:
          return errors.invalidArgument(`Unknown hitbox action: ${String(args.action)}`);
      }
    },
  );
}

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

type Workspace = ReturnType<typeof getWorkspace>;
type HitboxArgs = z.infer<z.ZodObject<typeof hitboxInputSchema>>;

// ---------------------------------------------------------------------------
// Action handlers
// ---------------------------------------------------------------------------

function describeHitbox(scene: SceneClass, name: string) {
  const hitbox = scene.get(name);
  return {
    name,
    kind: hitbox.kind,
    color: scene.colorOf(name),
    translation: hitbox.translation,
    anchor: hitbox.anchorPos,
    angle: hitbox.angle,
    final_coords: hitbox.finalCoords,
    ...(hitbox.isRect ? { width: hitbox.width, height: hitbox.height } : {}),
    ...(hitbox.isCircle ? { center: hitbox.center, radius: hitbox.radius } : {}),
  };
}

function parseColor(value: HitboxArgs['color']): Color | null | undefined {
  if (value === undefined) return undefined;
  return resolveColor(value);
}

function buildHitbox(args: HitboxArgs): HitboxClass | errors.DomainErrorResponse {
  const anchor: Point2D = args.anchor ?? [0, 0];
  switch (args.action) {
    case 'create_rect':
      if (args.x === undefined || args.y === undefined || args.width === undefined || args.height === undefined) {
        return errors.invalidArgument('hitbox create_rect requires "x", "y", "width" and "height".');
      }
      return HitboxClass.fromRect(args.x, args.y, args.width, args.height, anchor);
    case 'create_polygon':
      if (!args.points) {
        return errors.invalidArgument('hitbox create_polygon requires "points".');
      }
      return HitboxClass.fromPolygon(args.points, anchor);
    default:
      if (!args.center || args.radius === undefined) {
        return errors.invalidArgument('hitbox create_circle requires "center" and "radius".');
      }
      return HitboxClass.fromCircle(args.center, args.radius, anchor);
  }
}

function handleCreate(workspace: Workspace, scene: SceneClass, name: string, args: HitboxArgs) {
  if (scene.has(name)) {
    return errors.hitboxAlreadyExists(name);
  }
  const color = parseColor(args.color);
  if (color === null) {
    return errors.invalidColor();
  }

  try {
    const hitbox = buildHitbox(args);
    if (!(hitbox instanceof HitboxClass)) {
      return hitbox;
    }
    workspace.pushCommand(new AddHitboxCommand(scene, name, hitbox, color));
  } catch (e: unknown) {
    return caughtError(e);
  }

  return jsonResult({ message: `Hitbox '${name}' created.`, hitbox: describeHitbox(scene, name) });
}

function handleDelete(workspace: Workspace, scene: SceneClass, name: string) {
  if (!scene.has(name)) {
    return errors.hitboxNotFound(name);
  }
  workspace.pushCommand(new RemoveHitboxCommand(scene, name));
  return jsonResult({ message: `Hitbox '${name}' deleted.` });
}

function handleRename(workspace: Workspace, scene: SceneClass, name: string, newName: string | undefined) {
  if (!newName) {
    return errors.invalidArgument('hitbox rename requires "new_name".');
  }
  if (!scene.has(name)) {
    return errors.hitboxNotFound(name);
  }
  if (name !== newName && scene.has(newName)) {
    return errors.hitboxAlreadyExists(newName);
  }
  workspace.pushCommand(new RenameHitboxCommand(scene, name, newName));
  return jsonResult({ message: `Hitbox '${name}' renamed to '${newName}'.` });
}

function handleSetColor(workspace: Workspace, scene: SceneClass, name: string, value: HitboxArgs['color']) {
  if (!scene.has(name)) {
    return errors.hitboxNotFound(name);
  }
  const color = parseColor(value);
  if (color === undefined) {
    return errors.invalidArgument('hitbox set_color requires "color".');
  }
  if (color === null) {
    return errors.invalidColor();
  }
  workspace.pushCommand(new SetColorCommand(scene, name, color));
  return jsonResult({ message: `Hitbox '${name}' color set.`, color });
}

/**
 * Resolves the in-place edit for a transform action, or an argument error.
 */
function transformAction(args: HitboxArgs): ((hitbox: HitboxClass) => void) | errors.DomainErrorResponse {
  switch (args.action) {
    case 'move_to': {
      const { x, y } = args;
      if (x === undefined || y === undefined) {
        return errors.invalidArgument('hitbox move_to requires "x" and "y".');
      }
      return (h) => {
        h.moveTo(x, y);
      };
    }
    case 'set_anchor': {
      const { anchor, anchor_x, anchor_y } = args;
      if (anchor === undefined && anchor_x === undefined && anchor_y === undefined) {
        return errors.invalidArgument('hitbox set_anchor requires "anchor", "anchor_x" or "anchor_y".');
      }
      return (h) => {
        const [ax, ay] = anchor ?? h.anchorPos;
        h.anchorPos = [anchor_x ?? ax, anchor_y ?? ay];
      };
    }
    case 'set_angle': {
      const { angle } = args;
      if (angle === undefined) {
        return errors.invalidArgument('hitbox set_angle requires "angle".');
      }
      const radians = args.degrees ? (angle * Math.PI) / 180 : angle;
      return (h) => {
        h.angle = radians;
      };
    }
    case 'resize': {
      const { width, height } = args;
      if (width === undefined && height === undefined) {
        return errors.invalidArgument('hitbox resize requires "width" or "height".');
      }
      return (h) => {
        if (width !== undefined) h.width = width;
        if (height !== undefined) h.height = height;
      };
    }
    default: {
      const { radius } = args;
      if (radius === undefined) {
        return errors.invalidArgument('hitbox set_radius requires "radius".');
      }
      return (h) => {
        h.radius = radius;
      };
    }
  }
}

function handleTransform(workspace: Workspace, scene: SceneClass, name: string, args: HitboxArgs) {
  if (!scene.has(name)) {
    return errors.hitboxNotFound(name);
  }
  const action = transformAction(args);
  if (typeof action !== 'function') {
    return action;
  }

  try {
    workspace.pushCommand(new TransformCommand(`${args.action} ${name}`, scene, scene.get(name), action));
  } catch (e: unknown) {
    return caughtError(e);
  }

  return jsonResult({ message: `Hitbox '${name}' updated.`, hitbox: describeHitbox(scene, name) });
}
