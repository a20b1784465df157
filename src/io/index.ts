export { loadSceneFile, saveSceneFile, sceneFileSchema, SCENE_FILE_VERSION } from './scene-io.js';
export type { SceneFileEnvelope } from './scene-io.js';
export { encodePng, savePngFile } from './png-io.js';
