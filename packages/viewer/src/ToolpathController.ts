/**
 * ToolpathController - Interaction state for the toolpath viewer
 *
 * Holds the camera, layer filter and display toggles for one loaded toolpath
 * and translates pointer, wheel and key events into the core's pure update
 * functions. The host calls these once per event; there is no frame loop here.
 */

import {
  computeRenderTransform,
  createCameraState,
  createLayerFilter,
  DEFAULT_DISPLAY,
  DEFAULT_VIEWER_CONFIG,
  formatSummary,
  getLogger,
  orbit,
  resetCamera,
  stepLayerThreshold,
  toggleLayerFilter,
  visibleSegments,
  zoom,
  type CameraState,
  type DisplayState,
  type LayerFilterState,
  type LineSegment,
  type RenderTransform,
  type Toolpath,
  type ViewerConfig,
} from '@pathview/core';

const logger = getLogger('viewer');

/** What changed as a result of an event */
export type ViewChange = 'camera' | 'geometry' | 'overlay';

export type ChangeListener = (change: ViewChange) => void;

/** Keys the controller responds to */
export const KEY_BINDINGS = {
  reset: 'r',
  layers: 'l',
  travel: 'm',
  axes: 's',
  layerUp: 'ArrowUp',
  layerDown: 'ArrowDown',
} as const;

export class ToolpathController {
  readonly toolpath: Toolpath;
  readonly transform: RenderTransform;

  private cameraState: CameraState;
  private filterState: LayerFilterState;
  private displayState: DisplayState = DEFAULT_DISPLAY;
  private lastPointer: [number, number] | null = null;
  private listeners = new Set<ChangeListener>();

  constructor(toolpath: Toolpath, private readonly config: ViewerConfig = DEFAULT_VIEWER_CONFIG) {
    this.toolpath = toolpath;
    this.transform = computeRenderTransform(toolpath.bounds, config.normalize);
    this.cameraState = createCameraState(config.camera);
    this.filterState = createLayerFilter(toolpath.summary, config.layers);
  }

  get camera(): CameraState {
    return this.cameraState;
  }

  get layerFilter(): LayerFilterState {
    return this.filterState;
  }

  get display(): DisplayState {
    return this.displayState;
  }

  /**
   * Subscribe to changes; returns an unsubscribe function
   */
  onChange(listener: ChangeListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private emit(change: ViewChange): void {
    for (const listener of this.listeners) {
      listener(change);
    }
  }

  // ==========================================================================
  // Pointer and wheel
  // ==========================================================================

  pointerDown(x: number, y: number): void {
    this.lastPointer = [x, y];
  }

  pointerMove(x: number, y: number): void {
    if (!this.lastPointer) {
      return;
    }
    const [lastX, lastY] = this.lastPointer;
    this.lastPointer = [x, y];
    this.drag(x - lastX, y - lastY);
  }

  pointerUp(): void {
    this.lastPointer = null;
  }

  /**
   * Rotate by a drag delta in screen pixels
   */
  drag(dx: number, dy: number): void {
    if (dx === 0 && dy === 0) {
      return;
    }
    this.cameraState = orbit(this.cameraState, dx, dy, this.config.camera);
    this.emit('camera');
  }

  /**
   * Zoom by wheel units; positive moves closer
   */
  wheel(delta: number): void {
    if (delta === 0) {
      return;
    }
    this.cameraState = zoom(this.cameraState, delta, this.config.camera);
    this.emit('camera');
  }

  // ==========================================================================
  // Keys
  // ==========================================================================

  /**
   * Handle a key press; returns whether the key was bound
   */
  keyDown(key: string): boolean {
    const normalized = key.length === 1 ? key.toLowerCase() : key;
    switch (normalized) {
      case KEY_BINDINGS.reset:
        this.cameraState = resetCamera(this.config.camera);
        logger.info('Camera reset');
        this.emit('camera');
        return true;
      case KEY_BINDINGS.layers:
        this.filterState = toggleLayerFilter(this.filterState);
        logger.info(`Layer filter: ${this.filterState.enabled ? 'ON' : 'OFF'}`);
        this.emit('geometry');
        return true;
      case KEY_BINDINGS.travel:
        this.displayState = { ...this.displayState, showTravel: !this.displayState.showTravel };
        logger.info(`Travel moves: ${this.displayState.showTravel ? 'ON' : 'OFF'}`);
        this.emit('geometry');
        return true;
      case KEY_BINDINGS.axes:
        this.displayState = { ...this.displayState, showAxes: !this.displayState.showAxes };
        logger.info(`Axis indicator: ${this.displayState.showAxes ? 'ON' : 'OFF'}`);
        this.emit('overlay');
        return true;
      case KEY_BINDINGS.layerUp:
      case KEY_BINDINGS.layerDown:
        return this.stepLayer(normalized === KEY_BINDINGS.layerUp ? 1 : -1);
      default:
        return false;
    }
  }

  private stepLayer(direction: 1 | -1): boolean {
    const next = stepLayerThreshold(this.filterState, direction);
    if (next === this.filterState) {
      return false;
    }
    this.filterState = next;
    logger.info(`Layer filter Z: ${next.threshold.toFixed(2)}`);
    this.emit('geometry');
    return true;
  }

  // ==========================================================================
  // Queries
  // ==========================================================================

  /**
   * Segments to draw under the current filter and toggles
   */
  visibleSegments(): LineSegment[] {
    return visibleSegments(this.toolpath.segments, this.filterState, this.displayState);
  }

  /**
   * One-line status for the overlay
   */
  statusText(): string {
    const travel = this.displayState.showTravel ? 'ON' : 'OFF';
    const axes = this.displayState.showAxes ? 'ON' : 'OFF';
    const layers = this.filterState.enabled ? ` | Layer Z: ${this.filterState.threshold.toFixed(2)}` : '';
    return `${formatSummary(this.toolpath)} | Travel: ${travel} | Axis: ${axes}${layers}`;
  }
}

export const CONTROLS_HELP =
  'Controls: Drag=Rotate | Scroll=Zoom | R=Reset | L=Layers | M=Travel | S=Axis | Up/Down=Filter';
