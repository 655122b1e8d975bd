import React from 'react';
import type { DrawCommand, Point, StrokeStyle } from '../types';
import { LABEL_BOX_FILL } from '../constants';

const LABEL_FONT_SIZE = 13;
const LABEL_CHAR_WIDTH = 7.2;
const LABEL_PAD_X = 4;
const LABEL_HEIGHT = 19;

const strokeProps = (stroke: StrokeStyle) => ({
  stroke: stroke.color,
  strokeWidth: stroke.width,
  strokeLinecap: 'round' as const,
  strokeDasharray: stroke.dash?.join(' ')
});

/**
 * SVG label with the same geometry as the export: a dark rounded box whose
 * bottom-left corner sits on `at`. Width is estimated from the character count.
 */
const Label: React.FC<{ at: Point; text: string }> = ({ at, text }) => {
  const width = text.length * LABEL_CHAR_WIDTH + LABEL_PAD_X * 2;
  return (
    <g transform={`translate(${at.x}, ${at.y})`}>
      <rect x={0} y={-LABEL_HEIGHT} width={width} height={LABEL_HEIGHT} rx={4} fill={LABEL_BOX_FILL} />
      <text
        x={LABEL_PAD_X}
        y={-LABEL_HEIGHT / 2}
        dominantBaseline="central"
        fill="white"
        fontSize={LABEL_FONT_SIZE}
        fontFamily="sans-serif"
        style={{ paintOrder: 'stroke', stroke: 'rgba(0, 0, 0, 0.5)', strokeWidth: 2 }}
      >
        {text}
      </text>
    </g>
  );
};

const renderCommand = (cmd: DrawCommand, key: number) => {
  switch (cmd.type) {
    case 'segment':
    case 'guide':
      return <line key={key} x1={cmd.from.x} y1={cmd.from.y} x2={cmd.to.x} y2={cmd.to.y} fill="none" {...strokeProps(cmd.stroke)} />;
    case 'handle':
      return <circle key={key} cx={cmd.at.x} cy={cmd.at.y} r={cmd.radius} fill={cmd.fill} />;
    case 'label':
      return <Label key={key} at={cmd.at} text={cmd.text} />;
  }
};

/**
 * Scene layer: draw commands are already in view coordinates, so the SVG
 * needs no transform of its own.
 */
export const SceneLayer: React.FC<{ commands: readonly DrawCommand[] }> = ({ commands }) => (
  <g className="pointer-events-none">
    {commands.map(renderCommand)}
  </g>
);
