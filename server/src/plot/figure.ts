import type { CleanCatalogRow } from '../catalog/catalogRow';
import type { AxisConfig, SurveyConfig, TargetStatus } from '../config/survey';
import { groupByFlags, groupByStatus } from '../survey/classifier';
import type { ClassifiedTarget } from '../survey/joiner';

export type Grouping = 'status' | 'flags';

export interface PlotPoint {
  name: string;
  x: number;
  y: number;
}

export interface MarkerStyle {
  shape: 'open-circle' | 'filled-circle';
  color: string;
  size: number;
  stroke?: string;
}

export interface BackgroundLayer {
  marker: MarkerStyle;
  points: PlotPoint[];
}

export interface ForegroundLayer {
  status: TargetStatus;
  label: string;
  marker: MarkerStyle;
  points: PlotPoint[];
}

export interface Figure {
  title: string;
  x: AxisConfig;
  y: AxisConfig;
  background: BackgroundLayer;
  /** In category order; drawn after the background. */
  foreground: ForegroundLayer[];
}

export interface FigureOptions {
  grouping?: Grouping;
  title?: string;
}

function toPoint(row: Pick<CleanCatalogRow, 'name' | 'eqTempK' | 'radiusJ'>): PlotPoint {
  return { name: row.name, x: row.eqTempK, y: row.radiusJ };
}

export function buildFigure(
  catalog: readonly CleanCatalogRow[],
  targets: readonly ClassifiedTarget[],
  config: SurveyConfig,
  options?: FigureOptions
): Figure {
  const statuses = config.categories.map((c) => c.status);
  const groups =
    options?.grouping === 'flags' ? groupByFlags(targets, statuses) : groupByStatus(targets, statuses);

  return {
    title: options?.title ?? config.title,
    x: config.x,
    y: config.y,
    background: {
      marker: { shape: 'open-circle', color: config.background.color, size: config.background.size },
      points: catalog.map(toPoint)
    },
    foreground: config.categories.map((category) => ({
      status: category.status,
      label: category.status,
      marker: {
        shape: 'filled-circle',
        color: category.color,
        size: config.foreground.size,
        stroke: config.foreground.stroke
      },
      points: (groups.get(category.status) ?? []).map(toPoint)
    }))
  };
}

export function isWithinLimits(figure: Pick<Figure, 'x' | 'y'>, point: PlotPoint): boolean {
  const [x0, x1] = figure.x.limits;
  const [y0, y1] = figure.y.limits;
  return point.x >= x0 && point.x <= x1 && point.y >= y0 && point.y <= y1;
}

/** Points drawn nowhere because the fixed axis limits clip them, across all layers. */
export function countHiddenPoints(figure: Figure): number {
  const layers = [figure.background, ...figure.foreground];
  return layers.reduce(
    (total, layer) => total + layer.points.filter((point) => !isWithinLimits(figure, point)).length,
    0
  );
}
