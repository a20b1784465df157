import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import { loadSceneFile, saveSceneFile, SCENE_FILE_VERSION } from './scene-io.js';
import { type Scene } from '../types/scene.js';

describe('scene-io', () => {
    let tempDir: string;

    beforeEach(async () => {
        tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'hitboxmcp-scene-io-'));
    });

    afterEach(async () => {
        await fs.rm(tempDir, { recursive: true, force: true });
    });

    function makeTestScene(): Scene {
        return {
            name: 'arena',
            defaults: { sacrifice_mtv: true, render_scale: 4 },
            hitboxes: [
                {
                    name: 'wall',
                    color: [128, 128, 128, 255],
                    hitbox: {
                        kind: 'rect',
                        coords: [[0, 0], [10, 0], [10, 2], [0, 2]],
                        translation: [0, 0],
                        anchor: [0, 0],
                        angle: 0,
                    },
                },
                {
                    name: 'ball',
                    color: [255, 0, 0, 255],
                    hitbox: {
                        kind: 'circle',
                        coords: [[5, 5], [1, 0]],
                        translation: [5, 5],
                        anchor: [0, 0],
                        angle: 0,
                    },
                },
            ],
        };
    }

    it('saves with an envelope and loads back the scene', async () => {
        const filePath = path.join(tempDir, 'nested', 'arena.json');
        await saveSceneFile(filePath, makeTestScene(), '2020-01-01T00:00:00.000Z');

        const raw = JSON.parse(await fs.readFile(filePath, 'utf8'));
        expect(raw.hitboxmcp_version).toBe(SCENE_FILE_VERSION);
        expect(raw.created).toBe('2020-01-01T00:00:00.000Z');
        expect(typeof raw.modified).toBe('string');

        const { scene, created } = await loadSceneFile(filePath);
        expect(scene).toEqual(makeTestScene());
        expect(created).toBe('2020-01-01T00:00:00.000Z');
    });

    it('stamps created when none is given', async () => {
        const filePath = path.join(tempDir, 'arena.json');
        await saveSceneFile(filePath, makeTestScene());
        const raw = JSON.parse(await fs.readFile(filePath, 'utf8'));
        expect(raw.created).toBe(raw.modified);
    });

    it('reports a missing file', async () => {
        const filePath = path.join(tempDir, 'missing.json');
        await expect(loadSceneFile(filePath)).rejects.toThrow(`Scene file not found: ${filePath}`);
    });

    it('reports invalid JSON', async () => {
        const filePath = path.join(tempDir, 'broken.json');
        await fs.writeFile(filePath, '{ not json', 'utf8');
        await expect(loadSceneFile(filePath)).rejects.toThrow(`Invalid JSON in scene file: ${filePath}.`);
    });

    it('rejects a rect whose corners are not an axis-aligned rectangle', async () => {
        const filePath = path.join(tempDir, 'skewed.json');
        const bad = { hitboxmcp_version: '1.0', ...makeTestScene() };
        bad.hitboxes[0].hitbox.coords = [[0, 0], [10, 0], [20, 10], [0, 10]];
        await fs.writeFile(filePath, JSON.stringify(bad), 'utf8');

        await expect(loadSceneFile(filePath)).rejects.toThrow(
            `File ${filePath} does not match the required Scene format (hitboxes.0.hitbox.coords: A rect hitbox needs axis-aligned corners in bottom-left, bottom-right, top-right, top-left order.).`,
        );
    });

    it('reports the first schema violation with its path', async () => {
        const filePath = path.join(tempDir, 'bad.json');
        const bad = { hitboxmcp_version: '1.0', ...makeTestScene() };
        bad.hitboxes[1].color = [255, 0, 0, 999];
        await fs.writeFile(filePath, JSON.stringify(bad), 'utf8');

        await expect(loadSceneFile(filePath)).rejects.toThrow(
            `File ${filePath} does not match the required Scene format (hitboxes.1.color.3:`,
        );
    });
});
