import type { MotionPattern } from '../../config/settings';

// zoompan expressions per motion pattern. `on` is the output frame number,
// `iw`/`ih` the (overscaled) input size, `zoom` the current zoom factor.

const PAN_SPEED = 0.8;
const ZOOM_SPEED = 0.17;
const KEN_BURNS_SPEED = 60;

export interface ZoompanExpression {
  z: string;
  x: string;
  y: string;
}

const CENTER_X = 'iw/2-(iw/zoom/2)';
const CENTER_Y = 'ih/2-(ih/zoom/2)';

export function zoompanExpression(pattern: MotionPattern, totalFrames: number, fps: number): ZoompanExpression {
  switch (pattern) {
    case 'zoom_in':
      return { z: `min(1+on/${totalFrames}*${ZOOM_SPEED},1+${ZOOM_SPEED})`, x: CENTER_X, y: CENTER_Y };
    case 'zoom_out':
      return { z: `max(1+${ZOOM_SPEED}-on/${totalFrames}*${ZOOM_SPEED},1)`, x: CENTER_X, y: CENTER_Y };
    case 'pan_right':
      return { z: '1.1', x: `(iw-iw/zoom)*${PAN_SPEED}*(on/${totalFrames})`, y: CENTER_Y };
    case 'pan_left':
      return { z: '1.1', x: `(iw-iw/zoom)*${PAN_SPEED}*(1-on/${totalFrames})`, y: CENTER_Y };
    case 'pan_down':
      return { z: '1.1', x: CENTER_X, y: `(ih-ih/zoom)*${PAN_SPEED}*(on/${totalFrames})` };
    case 'pan_up':
      return { z: '1.1', x: CENTER_X, y: `(ih-ih/zoom)*${PAN_SPEED}*(1-on/${totalFrames})` };
    case 'ken_burns':
      return {
        z: `1+on/${totalFrames}*${ZOOM_SPEED}`,
        x: `${CENTER_X}+on*(${KEN_BURNS_SPEED}/${fps})`,
        y: `${CENTER_Y}+on*(${KEN_BURNS_SPEED}/${fps})`,
      };
  }
}

export interface ClipImage {
  duration: number;
  motion: MotionPattern;
}

/**
 * filter_complex for N looped image inputs: each is overscaled, moved with
 * zoompan at one output frame per input frame, smoothed, then all are
 * concatenated into `[out]`. Commas inside expressions are escaped.
 */
export function buildClipFilterGraph(
  images: readonly ClipImage[],
  frame: { width: number; height: number },
  overscale: number,
  fps: number
): string {
  const escape = (expr: string) => expr.replace(/,/g, '\\,');
  const chains = images.map((image, i) => {
    const totalFrames = Math.max(1, Math.round(image.duration * fps));
    const { z, x, y } = zoompanExpression(image.motion, totalFrames, fps);
    return (
      `[${i}:v]scale=${frame.width * overscale}:${frame.height * overscale}:flags=lanczos,` +
      `zoompan=z='${escape(z)}':x='${escape(x)}':y='${escape(y)}':d=1:fps=${fps}:s=${frame.width}x${frame.height},` +
      `setsar=1,tmix=frames=3[v${i}]`
    );
  });
  const labels = images.map((_, i) => `[v${i}]`).join('');
  return `${chains.join(';')};${labels}concat=n=${images.length}:v=1:a=0[out]`;
}
