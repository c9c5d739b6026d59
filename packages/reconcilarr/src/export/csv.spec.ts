import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { makeItem } from '../testing/memory-catalog.js';
import { formatCsv, toRow, toRows, writeCsv } from './csv.js';

describe('csv export', () => {
  it('maps an item to the fixed columns', () => {
    const item = makeItem('1', 'Heat', 1995, { paths: ['/m/Heat.mkv', '/m/Heat.4k.mkv'], watched: true, partCount: 2 });
    expect(toRow(item)).toEqual(['Heat', '1995', '/m/Heat.mkv; /m/Heat.4k.mkv', 'yes', '2']);
  });

  it('fills blanks for a missing year and path', () => {
    expect(toRow(makeItem('1', 'Alien'))).toEqual(['Alien', '', '(no path)', 'no', '1']);
  });

  it('quotes fields with separators and quotes', () => {
    const rows = toRows([makeItem('1', 'Crouching Tiger, Hidden "Dragon"', 2000)]);
    expect(formatCsv(rows)).toBe(
      'Title,Year,Path,Watched,Parts\r\n' +
      '"Crouching Tiger, Hidden ""Dragon""",2000,(no path),no,1\r\n'
    );
  });

  it('writes only the header for an empty report', () => {
    expect(formatCsv([])).toBe('Title,Year,Path,Watched,Parts\r\n');
  });

  it('creates parent directories when writing', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'reconcilarr-csv-'));
    try {
      const file = path.join(dir, 'nested', 'out.csv');
      const written = writeCsv(file, toRows([makeItem('1', 'Heat', 1995)]));
      expect(written).toBe(path.resolve(file));
      expect(fs.readFileSync(file, 'utf-8')).toBe('Title,Year,Path,Watched,Parts\r\nHeat,1995,(no path),no,1\r\n');
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});
