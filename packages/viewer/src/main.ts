/**
 * @pathview/viewer - browser entry
 *
 * Loads a G-code file chosen by the user (file picker or drag and drop),
 * builds the toolpath with @pathview/core and draws it with three.js.
 */

import * as THREE from 'three';
import { loadToolpathFromString, setLogLevel, DEFAULT_VIEWER_CONFIG } from '@pathview/core';
import { applyCameraState, createPerspectiveCamera } from './CameraAdapter.js';
import {
  createAxisIndicator,
  createToolpathLines,
  disposeAxisIndicator,
  disposeToolpathLines,
  updateToolpathLines,
} from './ToolpathAdapter.js';
import { CONTROLS_HELP, ToolpathController } from './ToolpathController.js';

const config = DEFAULT_VIEWER_CONFIG;
setLogLevel('info');

// ============================================================================
// Scene Setup
// ============================================================================

const scene = new THREE.Scene();
scene.background = new THREE.Color(20 / 255, 20 / 255, 30 / 255);

const camera = createPerspectiveCamera(window.innerWidth / window.innerHeight);

const renderer = new THREE.WebGLRenderer({ antialias: true });
renderer.setSize(window.innerWidth, window.innerHeight);
renderer.setPixelRatio(Math.min(window.devicePixelRatio, 2));

const app = document.getElementById('app');
if (!app) {
  throw new Error('Missing #app container');
}
app.appendChild(renderer.domElement);

// ============================================================================
// UI Overlay
// ============================================================================

const status = document.createElement('div');
status.style.cssText = 'position: fixed; top: 10px; left: 10px; color: #fff; font: 16px monospace;';
status.textContent = 'Drop a .gcode file or choose one below';
document.body.appendChild(status);

const help = document.createElement('div');
help.style.cssText = 'position: fixed; bottom: 10px; left: 10px; color: #ccc; font: 14px monospace;';
help.textContent = CONTROLS_HELP;
document.body.appendChild(help);

const picker = document.createElement('input');
picker.type = 'file';
picker.accept = '.gcode,.gco,.g,.nc,text/plain';
picker.style.cssText = 'position: fixed; top: 36px; left: 10px; color: #ccc;';
document.body.appendChild(picker);

// ============================================================================
// Toolpath
// ============================================================================

let controller: ToolpathController | null = null;
let lines: THREE.LineSegments | null = null;
let axes: THREE.Group | null = null;

function showToolpath(source: string, name: string): void {
  const { toolpath, stats } = loadToolpathFromString(source, { gcode: config.gcode });
  console.log(`Loaded ${name}: ${toolpath.summary.segmentCount} segments, ${stats.skippedLines} lines skipped`);

  if (lines) {
    scene.remove(lines);
    disposeToolpathLines(lines);
  }
  if (axes) {
    scene.remove(axes);
    disposeAxisIndicator(axes);
  }

  const next = new ToolpathController(toolpath, config);
  const { bounds } = toolpath;
  lines = createToolpathLines(next.visibleSegments(), bounds, next.transform);
  scene.add(lines);
  axes = bounds ? createAxisIndicator(bounds, next.transform) : null;
  if (axes) {
    scene.add(axes);
  }

  next.onChange((change) => {
    if (change === 'geometry' && lines) {
      updateToolpathLines(lines, next.visibleSegments(), bounds, next.transform);
    }
    if (change === 'overlay' && axes) {
      axes.visible = next.display.showAxes;
    }
    status.textContent = next.statusText();
  });

  controller = next;
  status.textContent = next.statusText();
}

async function openFile(file: File): Promise<void> {
  try {
    showToolpath(await file.text(), file.name);
  } catch (error) {
    console.error('Failed to load G-code:', error);
    status.textContent = `Failed to load ${file.name}`;
  }
}

picker.addEventListener('change', () => {
  const file = picker.files?.[0];
  if (file) {
    void openFile(file);
  }
});

window.addEventListener('dragover', (event) => event.preventDefault());
window.addEventListener('drop', (event) => {
  event.preventDefault();
  const file = event.dataTransfer?.files[0];
  if (file) {
    void openFile(file);
  }
});

// ============================================================================
// Input
// ============================================================================

renderer.domElement.addEventListener('pointerdown', (event) => {
  controller?.pointerDown(event.clientX, event.clientY);
});
window.addEventListener('pointermove', (event) => {
  controller?.pointerMove(event.clientX, event.clientY);
});
window.addEventListener('pointerup', () => controller?.pointerUp());
renderer.domElement.addEventListener(
  'wheel',
  (event) => {
    event.preventDefault();
    // DOM deltaY is positive when scrolling down (away)
    controller?.wheel(-event.deltaY / 100);
  },
  { passive: false }
);
window.addEventListener('keydown', (event) => {
  if (controller?.keyDown(event.key)) {
    event.preventDefault();
  }
});

window.addEventListener('resize', () => {
  camera.aspect = window.innerWidth / window.innerHeight;
  camera.updateProjectionMatrix();
  renderer.setSize(window.innerWidth, window.innerHeight);
});

// ============================================================================
// Animation Loop
// ============================================================================

function animate() {
  requestAnimationFrame(animate);
  if (controller) {
    applyCameraState(camera, controller.camera);
  }
  renderer.render(scene, camera);
}

animate();
