import type { DrawCommand, Point, StrokeStyle } from '../types';
import { LABEL_BOX_FILL, LABEL_FONT } from '../constants';

const LABEL_PAD_X = 4;
const LABEL_RADIUS = 4;

const strokeLine = (ctx: CanvasRenderingContext2D, from: Point, to: Point, stroke: StrokeStyle) => {
  ctx.save();
  ctx.strokeStyle = stroke.color;
  ctx.lineWidth = stroke.width;
  ctx.lineCap = 'round';
  ctx.setLineDash(stroke.dash ?? []);
  ctx.beginPath();
  ctx.moveTo(from.x, from.y);
  ctx.lineTo(to.x, to.y);
  ctx.stroke();
  ctx.restore();
};

// Rounded dark box whose bottom-left corner sits on `at`, text centred vertically.
const drawLabel = (ctx: CanvasRenderingContext2D, at: Point, text: string) => {
  ctx.save();
  ctx.font = LABEL_FONT;
  const metrics = ctx.measureText(text);
  const textHeight = metrics.actualBoundingBoxAscent + metrics.actualBoundingBoxDescent;
  const w = metrics.width + LABEL_PAD_X * 2;
  const h = Math.max(textHeight, 10) + 6;
  ctx.fillStyle = LABEL_BOX_FILL;
  ctx.beginPath();
  ctx.roundRect(at.x, at.y - h, w, h, LABEL_RADIUS);
  ctx.fill();
  ctx.fillStyle = '#ffffff';
  ctx.textBaseline = 'middle';
  ctx.fillText(text, at.x + LABEL_PAD_X, at.y - h / 2);
  ctx.restore();
};

export const renderCommands = (ctx: CanvasRenderingContext2D, commands: readonly DrawCommand[]) => {
  commands.forEach(cmd => {
    switch (cmd.type) {
      case 'segment':
      case 'guide':
        strokeLine(ctx, cmd.from, cmd.to, cmd.stroke);
        break;
      case 'handle':
        ctx.save();
        ctx.fillStyle = cmd.fill;
        ctx.beginPath();
        ctx.arc(cmd.at.x, cmd.at.y, cmd.radius, 0, Math.PI * 2);
        ctx.fill();
        ctx.restore();
        break;
      case 'label':
        drawLabel(ctx, cmd.at, cmd.text);
        break;
    }
  });
};
