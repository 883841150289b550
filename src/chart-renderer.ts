// ABOUTME: Renders the comparative bar chart of the most-referenced datasets
// ABOUTME: Builds two horizontal bar panels as SVG and rasterises to PNG with sharp

import * as fs from 'fs/promises';
import * as path from 'path';
import sharp from 'sharp';
import { ecosystemLabel } from './ecosystems.js';
import { ChartError } from './errors.js';
import type { ChartOptions, QueryResult, ResultTable } from './types.js';

export interface ChartPanel {
  title: string;
  rows: QueryResult[];
  color: string;
}

const PANEL_COLORS = ['#4c72b0', '#dd8452'];

export class ChartRenderer {
  private readonly PANEL_WIDTH = 600;
  private readonly PANEL_PADDING = 20;
  private readonly LABEL_WIDTH = 170;
  private readonly VALUE_SPACE = 70;
  private readonly MARGIN_TOP = 70;
  private readonly MARGIN_BOTTOM = 30;
  private readonly ROW_HEIGHT = 32;
  private readonly BAR_HEIGHT = 22;

  /**
   * Highest counts first; rows with equal counts keep their table order
   */
  selectTopEntries(rows: readonly QueryResult[], n: number): QueryResult[] {
    return [...rows]
      .sort((a, b) => b.totalCount - a.totalCount)
      .slice(0, Math.max(0, n));
  }

  buildPanels(tables: readonly ResultTable[], topN: number): ChartPanel[] {
    return tables.map((table, index) => {
      if (table.rows.length === 0) {
        throw new ChartError(`No ${ecosystemLabel(table.ecosystem)} dataset counts to plot`);
      }
      const rows = this.selectTopEntries(table.rows, topN);
      return {
        title: `Top ${rows.length} ${ecosystemLabel(table.ecosystem)} datasets by code references`,
        rows,
        color: PANEL_COLORS[index % PANEL_COLORS.length],
      };
    });
  }

  /**
   * Lay panels out side by side, one horizontal bar with a value label per row
   */
  buildSvg(panels: readonly ChartPanel[]): string {
    const width = this.PANEL_WIDTH * panels.length;
    const maxRows = Math.max(0, ...panels.map(panel => panel.rows.length));
    const height = this.MARGIN_TOP + maxRows * this.ROW_HEIGHT + this.MARGIN_BOTTOM;
    const barAreaWidth = this.PANEL_WIDTH - 2 * this.PANEL_PADDING - this.LABEL_WIDTH - this.VALUE_SPACE;

    const parts: string[] = [
      `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}">`,
      `<rect width="${width}" height="${height}" fill="#ffffff"/>`,
      `<g font-family="DejaVu Sans, Arial, sans-serif" font-size="13" fill="#222222">`,
    ];

    panels.forEach((panel, panelIndex) => {
      const left = panelIndex * this.PANEL_WIDTH + this.PANEL_PADDING;
      const maxCount = Math.max(0, ...panel.rows.map(row => row.totalCount));
      const barX = left + this.LABEL_WIDTH;

      parts.push(
        `<text class="panel-title" x="${left + (this.PANEL_WIDTH - 2 * this.PANEL_PADDING) / 2}" y="40" ` +
          `text-anchor="middle" font-size="16" font-weight="bold">${escapeXml(panel.title)}</text>`
      );

      panel.rows.forEach((row, rowIndex) => {
        const y = this.MARGIN_TOP + rowIndex * this.ROW_HEIGHT;
        const textY = y + this.BAR_HEIGHT / 2 + 5;
        const barWidth = maxCount === 0 ? 0 : round1((row.totalCount / maxCount) * barAreaWidth);

        parts.push(
          `<text class="dataset-label" x="${barX - 8}" y="${textY}" text-anchor="end">${escapeXml(row.dataset)}</text>`,
          `<rect class="bar" x="${barX}" y="${y}" width="${barWidth}" height="${this.BAR_HEIGHT}" fill="${panel.color}"/>`,
          `<text class="value-label" x="${round1(barX + barWidth + 6)}" y="${textY}">${row.totalCount.toLocaleString('en-US')}</text>`
        );
      });
    });

    parts.push('</g>', '</svg>');
    return parts.join('\n');
  }

  /**
   * Render both tables to the output path; .svg paths get the markup, anything else a PNG
   */
  async render(tables: readonly ResultTable[], options: ChartOptions): Promise<string> {
    const svg = this.buildSvg(this.buildPanels(tables, options.topN));

    if (path.extname(options.outputPath).toLowerCase() === '.svg') {
      await fs.writeFile(options.outputPath, svg, 'utf-8');
    } else {
      await sharp(Buffer.from(svg)).png().toFile(options.outputPath);
    }

    console.error(`[ChartRenderer] Saved chart to ${options.outputPath}`);
    return options.outputPath;
  }
}

function round1(value: number): number {
  return Math.round(value * 10) / 10;
}

function escapeXml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}
