import { z } from 'zod';
import { type McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { getWorkspace } from '../classes/workspace.js';
import { HitboxClass } from '../classes/hitbox.js';
import { type SceneClass } from '../classes/scene.js';
import { TransformCommand } from '../commands/transform-command.js';
import { type CollisionResult } from '../algorithms/sat.js';
import * as errors from '../errors.js';
import { caughtError, jsonResult } from './respond.js';

/**
 * Zod input schema for the `collision` tool.
 */
const collisionInputSchema = {
  action: z
    .enum(['collide', 'collide_any', 'circle_collide', 'all_pairs', 'resolve'])
    .describe('Collision query to run'),
  a: z.string().optional().describe('First hitbox; the returned MTV moves this one'),
  b: z.string().optional().describe('Second hitbox (collide, circle_collide, resolve)'),
  others: z
    .array(z.string())
    .optional()
    .describe('Hitboxes tested in order by collide_any (default: every other hitbox in scene order). "a" itself is skipped'),
  sacrifice_mtv: z
    .boolean()
    .optional()
    .describe('Skip redundant rect axes. Exact yes/no, MTV may not be minimal. Defaults to the scene setting'),
};

/**
 * Registers the `collision` tool on the MCP server.
 */
export function registerCollisionTool(server: McpServer): void {
  server.registerTool(
    'collision',
    {
      title: 'Collision',
      description:
        'Separating Axis Theorem queries between hitboxes. Actions: collide, collide_any, circle_collide, all_pairs, resolve. The MTV (minimum translation vector) pushes "a" out of "b".',
      inputSchema: collisionInputSchema,
    },
    (args) => {
      const scene = getWorkspace().scene;
      if (!scene) {
        return errors.noSceneLoaded();
      }
      const sacrificeMTV = args.sacrifice_mtv ?? scene.sacrificeMTV;

      if (args.action === 'all_pairs') {
        return jsonResult({ pairs: scene.collisions(sacrificeMTV) });
      }

      if (!args.a) {
        return errors.invalidArgument(`collision ${args.action} requires "a".`);
      }
      if (!scene.has(args.a)) {
        return errors.hitboxNotFound(args.a);
      }
      const a = args.a;

      if (args.action === 'collide_any') {
        return handleCollideAny(scene, a, args.others, sacrificeMTV);
      }

      if (!args.b) {
        return errors.invalidArgument(`collision ${args.action} requires "b".`);
      }
      if (!scene.has(args.b)) {
        return errors.hitboxNotFound(args.b);
      }
      const b = args.b;
      if (a === b) {
        return errors.invalidArgument(`collision ${args.action} needs two different hitboxes.`);
      }

      switch (args.action) {
        case 'collide':
          return jsonResult(scene.get(a).collide(scene.get(b), sacrificeMTV));
        case 'circle_collide':
          try {
            return jsonResult(HitboxClass.circleCollide(scene.get(a), scene.get(b), sacrificeMTV));
          } catch (e: unknown) {
            return caughtError(e);
          }
        case 'resolve':
          return handleResolve(scene, a, b, sacrificeMTV);
        default:
          return errors.invalidArgument(`Unknown collision action: ${String(args.action)}`);
      }
    },
  );
}

// ---------------------------------------------------------------------------
// Action handlers
// ---------------------------------------------------------------------------

function handleCollideAny(scene: SceneClass, a: string, others: string[] | undefined, sacrificeMTV: boolean) {
  const names = (others ?? scene.names()).filter((n) => n !== a);
  const missing = names.find((n) => !scene.has(n));
  if (missing !== undefined) {
    return errors.hitboxNotFound(missing);
  }
  const result = scene.get(a).collideAny(names.map((n) => scene.get(n)), sacrificeMTV);
  return jsonResult({ ...result, tested: names });
}

/**
 * Moves `a` by its MTV against `b` as one undoable step.
 */
function handleResolve(scene: SceneClass, a: string, b: string, sacrificeMTV: boolean) {
  const hitbox = scene.get(a);
  const result: CollisionResult = hitbox.collide(scene.get(b), sacrificeMTV);
  if (!result.collides) {
    return jsonResult({ resolved: false, mtv: null, translation: hitbox.translation });
  }

  const { mtv } = result;
  try {
    getWorkspace().pushCommand(
      new TransformCommand(`resolve ${a} from ${b}`, scene, hitbox, (h) => {
        const [x, y] = h.translation;
        h.moveTo(x + mtv.x, y + mtv.y);
      }),
    );
  } catch (e: unknown) {
    return caughtError(e);
  }

  return jsonResult({ resolved: true, mtv, translation: hitbox.translation });
}
