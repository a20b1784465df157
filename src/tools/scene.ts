import * as path from 'node:path';
import { z } from 'zod';
import { type McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { getWorkspace } from '../classes/workspace.js';
import { renderScene } from '../classes/render-sync.js';
import { type RasterCanvas } from '../classes/canvas.js';
import { savePngFile } from '../io/index.js';
import { type SceneDefaults } from '../types/scene.js';
import { resolveColor } from '../types/color.js';
import * as errors from '../errors.js';
import { caughtError, jsonResult } from './respond.js';

/**
 * Zod input schema for the `scene` tool.
 *
 * Actions: info, new, open, save, undo, redo, render
 */
const sceneInputSchema = {
  action: z
    .enum(['info', 'new', 'open', 'save', 'undo', 'redo', 'render'])
    .describe('Action to perform on the editing session'),
  name: z.string().optional().describe('Scene name (required for new)'),
  path: z.string().optional().describe('Scene file for open/save, PNG file for render'),
  sacrifice_mtv: z.boolean().optional().describe('Default collision mode for the new scene'),
  render_scale: z.number().int().min(1).optional().describe('Integer PNG upscale (new: scene default; render: override)'),
  background: z
    .union([z.string(), z.array(z.number().int())])
    .optional()
    .describe('Render background: color name or [r, g, b, a] (new: scene default; render: override)'),
  highlight_collisions: z.boolean().optional().describe('render: fill colliding hitboxes at half alpha'),
};

/**
 * Registers the `scene` tool on the MCP server.
 */
export function registerSceneTool(server: McpServer): void {
  server.registerTool(
    'scene',
    {
      title: 'Scene',
      description:
        'Scene session management. Create, open and save scene files, undo/redo edits, query session state and render the scene to PNG.',
      inputSchema: sceneInputSchema,
    },
    async (args) => {
      const workspace = getWorkspace();

      switch (args.action) {
        case 'info':
          return jsonResult(workspace.info());
        case 'new':
          return handleNew(workspace, args);
        case 'open':
          return handleOpen(workspace, args.path);
        case 'save':
          return handleSave(workspace, args.path);
        case 'undo':
          return handleHistory(workspace, 'undo');
        case 'redo':
          return handleHistory(workspace, 'redo');
        case 'render':
          return handleRender(workspace, args);
        default:
          return errors.invalidArgument(`Unknown scene action: ${String(args.action)}`);
      }
    },
  );
}

// ---------------------------------------------------------------------------
// Action handlers
// ---------------------------------------------------------------------------

type Workspace = ReturnType<typeof getWorkspace>;
type SceneArgs = z.infer<z.ZodObject<typeof sceneInputSchema>>;

function handleNew(workspace: Workspace, args: SceneArgs) {
  if (!args.name) {
    return errors.invalidArgument('scene new requires "name".');
  }

  const defaults: SceneDefaults = {};
  if (args.sacrifice_mtv !== undefined) defaults.sacrifice_mtv = args.sacrifice_mtv;
  if (args.render_scale !== undefined) defaults.render_scale = args.render_scale;
  if (args.background !== undefined) {
    const background = resolveColor(args.background);
    if (background === null) return errors.invalidColor();
    defaults.background = background;
  }

  const scene = workspace.newScene(args.name, defaults);
  return jsonResult({ message: `Scene '${scene.name}' created.`, defaults: scene.defaults });
}

async function handleOpen(workspace: Workspace, filePath: string | undefined) {
  if (!filePath) {
    return errors.invalidArgument('scene open requires "path".');
  }

  try {
    const scene = await workspace.openScene(filePath);
    return jsonResult({ message: `Scene '${scene.name}' opened.`, path: workspace.scenePath, hitboxes: scene.names() });
  } catch (e: unknown) {
    return caughtError(e);
  }
}

async function handleSave(workspace: Workspace, filePath: string | undefined) {
  if (!workspace.scene) {
    return errors.noSceneLoaded();
  }

  try {
    const saved = await workspace.saveScene(filePath);
    return jsonResult({ message: `Scene '${saved.name}' saved.`, path: saved.path });
  } catch (e: unknown) {
    return caughtError(e);
  }
}

function handleHistory(workspace: Workspace, direction: 'undo' | 'redo') {
  if (!workspace.scene) {
    return errors.noSceneLoaded();
  }

  try {
    const label = direction === 'undo' ? workspace.undo() : workspace.redo();
    return jsonResult({
      message: `${direction === 'undo' ? 'Undid' : 'Redid'}: ${label}`,
      undoDepth: workspace.undoDepth,
      redoDepth: workspace.redoDepth,
    });
  } catch (e: unknown) {
    return caughtError(e);
  }
}

async function handleRender(workspace: Workspace, args: SceneArgs) {
  const scene = workspace.scene;
  if (!scene) {
    return errors.noSceneLoaded();
  }
  if (!args.path) {
    return errors.invalidArgument('scene render requires "path".');
  }
  if (scene.size === 0) {
    return errors.emptyScene();
  }

  let background = scene.defaults.background;
  if (args.background !== undefined) {
    const resolved = resolveColor(args.background);
    if (resolved === null) return errors.invalidColor();
    background = resolved;
  }
  const scale = args.render_scale ?? scene.defaults.render_scale ?? 1;
  const target = path.resolve(args.path);

  let canvas: RasterCanvas;
  try {
    canvas = renderScene(scene, {
      background,
      highlightCollisions: args.highlight_collisions ?? false,
      sacrificeMTV: args.sacrifice_mtv,
      scale,
    });
  } catch (e: unknown) {
    return caughtError(e);
  }

  try {
    await savePngFile(target, canvas, scale);
  } catch {
    return errors.cannotWritePath(target);
  }

  return jsonResult({
    message: `Scene '${scene.name}' rendered.`,
    path: target,
    width: canvas.width * scale,
    height: canvas.height * scale,
    origin: [canvas.originX, canvas.originY],
  });
}
