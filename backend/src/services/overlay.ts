import sharp from 'sharp';
import { LANDMARK_NAMES, type KeypointSet, type LandmarkName } from '../types/contracts.js';

const BONES: ReadonlyArray<[LandmarkName, LandmarkName]> = [
  ['left_shoulder', 'right_shoulder'],
  ['left_hip', 'right_hip'],
  ['left_shoulder', 'left_hip'],
  ['right_shoulder', 'right_hip'],
  ['left_shoulder', 'left_elbow'],
  ['left_elbow', 'left_wrist'],
  ['right_shoulder', 'right_elbow'],
  ['right_elbow', 'right_wrist'],
  ['left_hip', 'left_knee'],
  ['left_knee', 'left_ankle'],
  ['right_hip', 'right_knee'],
  ['right_knee', 'right_ankle']
];

const VISIBLE_COLOR = '#10b981';
const WEAK_COLOR = '#f59e0b';
const WEAK_VISIBILITY = 0.5;

const XML_ENTITIES: Readonly<Record<string, string>> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&apos;'
};

function xmlText(text: string): string {
  return text.replace(/[&<>"']/g, ch => XML_ENTITIES[ch] ?? ch);
}

/** Legend of undetected landmarks in the bottom-left corner, one name per row. */
function missingLegend(names: string[], width: number, height: number, fontSize: number): string {
  const lineHeight = Math.round(fontSize * 1.3);
  const rows = [`Not detected (${names.length})`, ...names];
  const longest = Math.max(...rows.map(row => row.length));
  const boxWidth = Math.min(width - 8, Math.ceil(longest * fontSize * 0.6) + fontSize);
  const boxHeight = rows.length * lineHeight + fontSize;
  const left = 4;
  const top = Math.max(4, height - boxHeight - 4);
  const textX = left + Math.round(fontSize / 2);

  const spans = rows
    .map((row, index) => `<tspan x="${textX}" dy="${index === 0 ? 0 : lineHeight}">${xmlText(row)}</tspan>`)
    .join('');
  return (
    `<rect x="${left}" y="${top}" width="${boxWidth}" height="${boxHeight}" fill="#0f172a" fill-opacity="0.65" rx="4" />` +
    `<text x="${textX}" y="${top + fontSize + Math.round(fontSize / 4)}" font-family="Helvetica, sans-serif" font-size="${fontSize}" fill="#e2e8f0">${spans}</text>`
  );
}

export function buildPoseOverlaySvg(width: number, height: number, keypoints: KeypointSet): string {
  const minSide = Math.min(width, height);
  const strokeWidth = Math.max(2, Math.round(minSide * 0.006));
  const radius = Math.max(3, Math.round(minSide * 0.01));
  const fontSize = Math.max(12, Math.round(minSide * 0.025));

  const elements: string[] = [];

  for (const [from, to] of BONES) {
    const a = keypoints[from];
    const b = keypoints[to];
    if (!a || !b) continue;
    const color = Math.min(a.visibility, b.visibility) < WEAK_VISIBILITY ? WEAK_COLOR : VISIBLE_COLOR;
    elements.push(
      `<line x1="${Math.round(a.x)}" y1="${Math.round(a.y)}" x2="${Math.round(b.x)}" y2="${Math.round(b.y)}" stroke="${color}" stroke-width="${strokeWidth}" stroke-linecap="round" />`
    );
  }

  const missing: string[] = [];
  for (const name of LANDMARK_NAMES) {
    const point = keypoints[name];
    if (!point) {
      missing.push(name.replace('_', ' '));
      continue;
    }
    const color = point.visibility < WEAK_VISIBILITY ? WEAK_COLOR : VISIBLE_COLOR;
    elements.push(
      `<circle cx="${Math.round(point.x)}" cy="${Math.round(point.y)}" r="${radius}" fill="${color}" stroke="#111111" stroke-width="1" />`
    );
  }

  if (missing.length > 0) {
    elements.push(missingLegend(missing, width, height, fontSize));
  }

  return `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}">${elements.join('')}</svg>`;
}

export async function renderPoseOverlay(imageBuffer: Buffer, keypoints: KeypointSet): Promise<Buffer> {
  const image = sharp(imageBuffer);
  const metadata = await image.metadata();
  if (!metadata.width || !metadata.height) {
    throw new Error('Unable to read image dimensions for overlay rendering');
  }

  const svg = buildPoseOverlaySvg(metadata.width, metadata.height, keypoints);
  return image
    .composite([{ input: Buffer.from(svg), top: 0, left: 0 }])
    .png({ compressionLevel: 9 })
    .toBuffer();
}
