// ABOUTME: Tests for top-N selection and the two-panel bar chart output
// ABOUTME: Asserts bar geometry in the SVG and the size of the rasterised PNG

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import sharp from 'sharp';
import { ChartRenderer } from '../chart-renderer.js';
import { ChartError } from '../errors.js';
import type { ResultTable } from '../types.js';

const sklearnTable: ResultTable = {
  ecosystem: 'sklearn',
  rows: [
    { dataset: 'load_iris', totalCount: 120 },
    { dataset: 'load_wine', totalCount: 45 },
    { dataset: 'load_digits', totalCount: 300 },
  ],
};

const rTable: ResultTable = {
  ecosystem: 'r',
  rows: [{ dataset: 'iris', totalCount: 7 }],
};

describe('ChartRenderer', () => {
  const renderer = new ChartRenderer();

  describe('selectTopEntries', () => {
    it('orders by count and keeps at most n rows', () => {
      expect(renderer.selectTopEntries(sklearnTable.rows, 2)).toEqual([
        { dataset: 'load_digits', totalCount: 300 },
        { dataset: 'load_iris', totalCount: 120 },
      ]);
    });

    it('keeps table order for equal counts', () => {
      const rows = [
        { dataset: 'cars', totalCount: 5 },
        { dataset: 'women', totalCount: 9 },
        { dataset: 'trees', totalCount: 5 },
      ];
      expect(renderer.selectTopEntries(rows, 10).map(row => row.dataset)).toEqual(['women', 'cars', 'trees']);
    });

    it('does not reorder the input', () => {
      renderer.selectTopEntries(sklearnTable.rows, 1);
      expect(sklearnTable.rows[0].dataset).toBe('load_iris');
    });
  });

  describe('buildPanels', () => {
    it('titles each panel after its ecosystem', () => {
      const panels = renderer.buildPanels([sklearnTable, rTable], 10);
      expect(panels.map(panel => panel.title)).toEqual([
        'Top 3 scikit-learn datasets by code references',
        'Top 1 R datasets by code references',
      ]);
    });

    it('refuses an empty table', () => {
      expect(() => renderer.buildPanels([sklearnTable, { ecosystem: 'r', rows: [] }], 10)).toThrow(ChartError);
      expect(() => renderer.buildPanels([{ ecosystem: 'r', rows: [] }], 10)).toThrow(
        'No R dataset counts to plot'
      );
    });
  });

  describe('buildSvg', () => {
    const svg = renderer.buildSvg(renderer.buildPanels([sklearnTable, rTable], 2));

    it('sizes the canvas for two panels and the longest panel', () => {
      expect(svg).toContain('width="1200" height="164" viewBox="0 0 1200 164"');
    });

    it('draws one bar and one value label per selected row', () => {
      expect(svg.match(/<rect class="bar"/g)).toHaveLength(3);
      expect(svg.match(/<text class="value-label"/g)).toHaveLength(3);
    });

    it('scales bars against the panel maximum', () => {
      expect(svg).toContain('<rect class="bar" x="190" y="70" width="320" height="22" fill="#4c72b0"/>');
      expect(svg).toContain('<rect class="bar" x="190" y="102" width="128" height="22" fill="#4c72b0"/>');
      expect(svg).toContain('<rect class="bar" x="790" y="70" width="320" height="22" fill="#dd8452"/>');
    });

    it('labels bars with their counts', () => {
      expect(svg).toContain('<text class="value-label" x="516" y="86">300</text>');
      expect(svg).toContain('<text class="value-label" x="324" y="118">120</text>');
    });

    it('escapes dataset names', () => {
      const escaped = renderer.buildSvg([{ title: 'T', rows: [{ dataset: 'a<b&c', totalCount: 1 }], color: '#000' }]);
      expect(escaped).toContain('>a&lt;b&amp;c</text>');
    });

    it('formats large counts with thousands separators', () => {
      const large = renderer.buildSvg([{ title: 'T', rows: [{ dataset: 'iris', totalCount: 12345 }], color: '#000' }]);
      expect(large).toContain('>12,345</text>');
    });
  });

  describe('render', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await fs.mkdtemp(path.join(os.tmpdir(), 'chart-'));
      vi.spyOn(console, 'error').mockImplementation(() => {});
    });

    afterEach(async () => {
      vi.restoreAllMocks();
      await fs.rm(dir, { recursive: true, force: true });
    });

    it('writes SVG markup for an .svg path', async () => {
      const outputPath = path.join(dir, 'chart.svg');
      await expect(renderer.render([sklearnTable, rTable], { outputPath, topN: 10 })).resolves.toBe(outputPath);

      const content = await fs.readFile(outputPath, 'utf-8');
      expect(content.startsWith('<svg xmlns="http://www.w3.org/2000/svg" width="1200" height="196"')).toBe(true);
    });

    it('rasterises to PNG for other paths', async () => {
      const outputPath = path.join(dir, 'chart.png');
      await renderer.render([sklearnTable, rTable], { outputPath, topN: 10 });

      const metadata = await sharp(outputPath).metadata();
      expect(metadata.format).toBe('png');
      expect(metadata.width).toBe(1200);
      expect(metadata.height).toBe(196);
    });
  });
});
