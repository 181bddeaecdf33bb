import * as d3 from 'd3';
import { JSDOM } from 'jsdom';

import type { Figure, MarkerStyle, PlotPoint } from './figure';

export interface RenderSize {
  width: number;
  height: number;
}

export const DEFAULT_RENDER_SIZE: RenderSize = { width: 650, height: 300 };

const CLIP_ID = 'plot-area';
const margin = { top: 30, right: 20, bottom: 45, left: 55 };

type Group = d3.Selection<SVGGElement, unknown, null, undefined>;

function drawPoints(
  layer: Group,
  points: PlotPoint[],
  marker: MarkerStyle,
  x: d3.ScaleLinear<number, number>,
  y: d3.ScaleLinear<number, number>
): void {
  const filled = marker.shape === 'filled-circle';
  layer
    .selectAll('circle')
    .data(points)
    .join('circle')
    .attr('cx', (d) => x(d.x))
    .attr('cy', (d) => y(d.y))
    .attr('r', marker.size / 2)
    .attr('fill', filled ? marker.color : 'none')
    .attr('stroke', filled ? marker.stroke ?? 'none' : marker.color)
    .attr('stroke-width', 1)
    .attr('data-name', (d) => d.name);
}

/**
 * Renders the figure as a standalone SVG document. Axis limits are fixed by
 * the figure; points outside them are clipped.
 */
export function renderFigureSvg(figure: Figure, size: RenderSize = DEFAULT_RENDER_SIZE): string {
  const dom = new JSDOM('<!DOCTYPE html><html><body></body></html>');
  const body = d3.select(dom.window.document.body);

  const innerWidth = size.width - margin.left - margin.right;
  const innerHeight = size.height - margin.top - margin.bottom;

  const svg = body
    .append('svg')
    .attr('width', size.width)
    .attr('height', size.height)
    .attr('viewBox', `0 0 ${size.width} ${size.height}`)
    .attr('font-family', 'sans-serif');

  svg
    .append('defs')
    .append('clipPath')
    .attr('id', CLIP_ID)
    .append('rect')
    .attr('width', innerWidth)
    .attr('height', innerHeight);

  const g = svg.append('g').attr('transform', `translate(${margin.left},${margin.top})`);

  const x = d3.scaleLinear().domain(figure.x.limits).range([0, innerWidth]);
  const y = d3.scaleLinear().domain(figure.y.limits).range([innerHeight, 0]);

  g.append('g')
    .attr('class', 'x-axis')
    .attr('transform', `translate(0,${innerHeight})`)
    .call(d3.axisBottom(x).ticks(6));

  g.append('g').attr('class', 'y-axis').call(d3.axisLeft(y).ticks(5));

  g.append('text')
    .attr('class', 'x-axis-label')
    .attr('x', innerWidth / 2)
    .attr('y', innerHeight + margin.bottom - 8)
    .attr('text-anchor', 'middle')
    .attr('font-size', '12px')
    .text(figure.x.label);

  g.append('text')
    .attr('class', 'y-axis-label')
    .attr('transform', 'rotate(-90)')
    .attr('x', -innerHeight / 2)
    .attr('y', -margin.left + 14)
    .attr('text-anchor', 'middle')
    .attr('font-size', '12px')
    .text(figure.y.label);

  svg
    .append('text')
    .attr('class', 'title')
    .attr('x', size.width / 2)
    .attr('y', margin.top / 2 + 4)
    .attr('text-anchor', 'middle')
    .attr('font-size', '14px')
    .text(figure.title);

  const plotArea = g.append('g').attr('clip-path', `url(#${CLIP_ID})`);

  drawPoints(
    plotArea.append('g').attr('class', 'background'),
    figure.background.points,
    figure.background.marker,
    x,
    y
  );

  const foreground = plotArea.append('g').attr('class', 'foreground');
  for (const layer of figure.foreground) {
    drawPoints(
      foreground.append('g').attr('class', 'layer').attr('data-status', layer.status),
      layer.points,
      layer.marker,
      x,
      y
    );
  }

  // Legend, upper left inside the axes.
  const rowHeight = 18;
  const legend = g.append('g').attr('class', 'legend').attr('transform', 'translate(10,10)');
  figure.foreground.forEach((layer, i) => {
    const row = legend
      .append('g')
      .attr('class', 'legend-entry')
      .attr('data-status', layer.status)
      .attr('transform', `translate(0,${i * rowHeight})`);
    row
      .append('circle')
      .attr('cx', 6)
      .attr('cy', 6)
      .attr('r', layer.marker.size / 2)
      .attr('fill', layer.marker.color)
      .attr('stroke', layer.marker.stroke ?? 'none');
    row
      .append('text')
      .attr('x', 18)
      .attr('y', 10)
      .attr('font-size', '11px')
      .text(layer.label);
  });

  const node = svg.node();
  if (!node) {
    throw new Error('SVG rendering produced no element');
  }
  // The XML serializer declares the SVG namespace and escapes only what XML defines.
  return new dom.window.XMLSerializer().serializeToString(node);
}
