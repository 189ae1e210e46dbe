import { DEFAULT_VIEWER_CONFIG, loadToolpathFromString } from '@pathview/core';
import { CONTROLS_HELP, ToolpathController, type ViewChange } from './ToolpathController.js';

// Segments: travel z0.2, extrusion z0.2, travel z0.4, extrusion z0.4
const PROGRAM = ['G1 Z0.2', 'G1 X10 E1', 'G1 Z0.4', 'G1 X0 E2'].join('\n');

function setup() {
  const { toolpath } = loadToolpathFromString(PROGRAM);
  const controller = new ToolpathController(toolpath);
  const changes: ViewChange[] = [];
  controller.onChange((change) => changes.push(change));
  return { controller, changes };
}

const { defaultYaw, defaultPitch, defaultDistance } = DEFAULT_VIEWER_CONFIG.camera;

describe('ToolpathController', () => {
  it('starts at the default view with everything visible', () => {
    const { controller } = setup();
    expect(controller.camera).toEqual({ yaw: defaultYaw, pitch: defaultPitch, distance: defaultDistance });
    expect(controller.layerFilter.enabled).toBe(false);
    expect(controller.visibleSegments()).toHaveLength(4);
    expect(controller.transform.scale).toBeCloseTo(0.2);
    expect(controller.statusText()).toBe('Segments: 4 | Layers: 3 | Size: 10.0x0.0x0.4mm | Travel: ON | Axis: ON');
  });

  describe('pointer and wheel', () => {
    it('orbits by the drag delta while the pointer is down', () => {
      const { controller, changes } = setup();
      controller.pointerDown(100, 100);
      controller.pointerMove(110, 105);

      expect(controller.camera.yaw).toBeCloseTo(defaultYaw + 0.1);
      expect(controller.camera.pitch).toBeCloseTo(defaultPitch - 0.05);
      expect(changes).toEqual(['camera']);
    });

    it('ignores moves without a pressed pointer', () => {
      const { controller, changes } = setup();
      controller.pointerMove(50, 50);
      controller.pointerDown(0, 0);
      controller.pointerUp();
      controller.pointerMove(50, 50);

      expect(controller.camera.yaw).toBe(defaultYaw);
      expect(changes).toEqual([]);
    });

    it('zooms closer on positive wheel deltas', () => {
      const { controller, changes } = setup();
      controller.wheel(1);
      controller.wheel(0);

      expect(controller.camera.distance).toBeCloseTo(2.9);
      expect(changes).toEqual(['camera']);
    });
  });

  describe('keys', () => {
    it('resets the camera', () => {
      const { controller } = setup();
      controller.drag(40, -30);
      controller.wheel(5);

      expect(controller.keyDown('R')).toBe(true);
      expect(controller.camera).toEqual({ yaw: defaultYaw, pitch: defaultPitch, distance: defaultDistance });
    });

    it('steps the layer threshold only while the filter is on', () => {
      const { controller, changes } = setup();
      expect(controller.keyDown('ArrowDown')).toBe(false);
      expect(controller.layerFilter.threshold).toBeCloseTo(0.4);

      expect(controller.keyDown('l')).toBe(true);
      expect(controller.statusText()).toBe(
        'Segments: 4 | Layers: 3 | Size: 10.0x0.0x0.4mm | Travel: ON | Axis: ON | Layer Z: 0.40'
      );

      // 0.4 - 0.5 clamps to the bottom of the model
      expect(controller.keyDown('ArrowDown')).toBe(true);
      expect(controller.layerFilter.threshold).toBe(0);
      expect(controller.visibleSegments()).toEqual([]);

      expect(controller.keyDown('ArrowUp')).toBe(true);
      expect(controller.layerFilter.threshold).toBeCloseTo(0.4);
      expect(controller.visibleSegments()).toHaveLength(4);

      expect(changes).toEqual(['geometry', 'geometry', 'geometry']);
    });

    it('hides travel moves', () => {
      const { controller, changes } = setup();
      expect(controller.keyDown('m')).toBe(true);

      const kinds = controller.visibleSegments().map((segment) => segment.kind);
      expect(kinds).toEqual(['extrusion', 'extrusion']);
      expect(controller.statusText()).toContain('| Travel: OFF |');
      expect(changes).toEqual(['geometry']);
    });

    it('toggles the axis indicator as an overlay change', () => {
      const { controller, changes } = setup();
      expect(controller.keyDown('s')).toBe(true);
      expect(controller.display.showAxes).toBe(false);
      expect(changes).toEqual(['overlay']);
    });

    it('reports unbound keys', () => {
      const { controller, changes } = setup();
      expect(controller.keyDown('x')).toBe(false);
      expect(controller.keyDown('Escape')).toBe(false);
      expect(changes).toEqual([]);
    });
  });

  it('stops notifying after unsubscribe', () => {
    const { toolpath } = loadToolpathFromString(PROGRAM);
    const controller = new ToolpathController(toolpath);
    const listener = vi.fn<(change: ViewChange) => void>();
    const unsubscribe = controller.onChange(listener);

    controller.wheel(1);
    unsubscribe();
    controller.wheel(1);

    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener).toHaveBeenCalledWith('camera');
  });

  it('lists every binding in the help text', () => {
    expect(CONTROLS_HELP).toBe(
      'Controls: Drag=Rotate | Scroll=Zoom | R=Reset | L=Layers | M=Travel | S=Axis | Up/Down=Filter'
    );
  });
});
