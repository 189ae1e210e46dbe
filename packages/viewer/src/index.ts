export {
  segmentColor,
  heightRatio,
  lineLighting,
  toolpathToBufferGeometry,
  createToolpathLines,
  updateToolpathLines,
  disposeToolpathLines,
  disposeAxisIndicator,
  createAxisIndicator,
  tickInterval,
  tickOffsets,
  LIGHT_DIRECTION,
  type Rgba,
} from './ToolpathAdapter.js';
export { applyCameraState, createPerspectiveCamera, DEFAULT_FOV } from './CameraAdapter.js';
export {
  ToolpathController,
  KEY_BINDINGS,
  CONTROLS_HELP,
  type ViewChange,
  type ChangeListener,
} from './ToolpathController.js';
