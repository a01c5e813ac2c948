/**
 * Mock factories for unit tests
 */
import { vi } from 'vitest';

function createMockImageData(width: number, height: number): ImageData {
  return {
    data: new Uint8ClampedArray(Math.max(1, width * height * 4)),
    width,
    height,
    colorSpace: 'srgb'
  };
}

/**
 * Create a mock canvas element
 */
export function createMockCanvas(width = 800, height = 600): HTMLCanvasElement {
  const canvas = document.createElement('canvas');
  canvas.width = width;
  canvas.height = height;
  return canvas;
}

/**
 * Create a mock canvas 2D context with the methods the surface uses stubbed.
 * measureText reports 8px per character.
 */
export function createMockContext(canvas: HTMLCanvasElement = createMockCanvas()): CanvasRenderingContext2D {
  return {
    // Drawing rectangles
    fillRect: vi.fn(),
    strokeRect: vi.fn(),
    clearRect: vi.fn(),

    // Drawing text
    fillText: vi.fn(),
    strokeText: vi.fn(),
    measureText: vi.fn((text: string) => ({
      width: text.length * 8,
      actualBoundingBoxAscent: 10,
      actualBoundingBoxDescent: 3,
      fontBoundingBoxAscent: 12,
      fontBoundingBoxDescent: 4,
      actualBoundingBoxLeft: 0,
      actualBoundingBoxRight: text.length * 8,
      emHeightAscent: 10,
      emHeightDescent: 3,
      hangingBaseline: 10,
      alphabeticBaseline: 0,
      ideographicBaseline: -3
    })),

    // Paths
    beginPath: vi.fn(),
    closePath: vi.fn(),
    moveTo: vi.fn(),
    lineTo: vi.fn(),
    arc: vi.fn(),
    quadraticCurveTo: vi.fn(),
    rect: vi.fn(),
    fill: vi.fn(),
    stroke: vi.fn(),
    clip: vi.fn(),

    // Transformations
    save: vi.fn(),
    restore: vi.fn(),
    translate: vi.fn(),
    scale: vi.fn(),
    setTransform: vi.fn(),

    // Drawing images
    drawImage: vi.fn(),
    createImageData: vi.fn((width: number, height: number) => createMockImageData(width, height)),
    getImageData: vi.fn((_x: number, _y: number, width: number, height: number) =>
      createMockImageData(width, height)
    ),
    putImageData: vi.fn(),

    // Line styles
    lineWidth: 1,
    lineCap: 'butt',
    lineJoin: 'miter',
    setLineDash: vi.fn(),
    getLineDash: vi.fn(() => []),

    // Fill and stroke styles
    fillStyle: '#000000',
    strokeStyle: '#000000',

    // Text styles
    font: '10px sans-serif',
    textAlign: 'start',
    textBaseline: 'alphabetic',

    globalAlpha: 1,

    // Canvas reference
    canvas
  } as unknown as CanvasRenderingContext2D;
}

/**
 * Create a container element with a fixed client size (jsdom does no layout).
 */
export function createMockContainer(width = 612, height = 792): HTMLElement {
  const container = document.createElement('div');
  container.style.width = `${width}px`;
  container.style.height = `${height}px`;
  Object.defineProperty(container, 'clientWidth', { value: width, writable: true });
  Object.defineProperty(container, 'clientHeight', { value: height, writable: true });
  return container;
}
