import { describe, expect, it } from 'vitest';
import {
  countEmptyRows,
  diagnose,
  findEmptyRowIndices,
  isPlaceholderColumnName,
  kindHistogram,
  resolveDiagnosticsConfig
} from '../diagnostics/index.js';
import type { TabularDataset } from '../table/types.js';
import {
  datasetFromRows,
  emptyColumnsDataset,
  emptyRowsDataset,
  goodDataset,
  mixedTypesDataset
} from './fixtures.js';

describe('diagnose', () => {
  it('reports no issues for a clean table', () => {
    const report = diagnose(goodDataset());

    expect(report).toEqual({
      row_count: 3,
      column_count: 3,
      column_names: ['Name', 'Age', 'City'],
      empty_columns: [],
      empty_row_count: 0,
      mixed_type_columns: {},
      headers_missing_suspected: false
    });
  });

  it('suspects missing headers when the loader assigned placeholder names', () => {
    const dataset = datasetFromRows(
      ['Column_0', 'Column_1', 'Column_2'],
      [
        ['Alice', 25, 'New York'],
        ['Bob', 30, 'Los Angeles']
      ]
    );

    expect(diagnose(dataset).headers_missing_suspected).toBe(true);
  });

  it('lists fully missing columns in column order', () => {
    const report = diagnose(emptyColumnsDataset());

    expect(report.empty_columns).toEqual(['Unused1', 'Unused2']);
    expect(report.mixed_type_columns).toEqual({});
  });

  it('builds a kind histogram for columns holding several kinds', () => {
    const report = diagnose(mixedTypesDataset());

    expect(report.mixed_type_columns).toEqual({
      ID: { integer: 3, string: 1 },
      Value: { float: 3, string: 1 }
    });
  });

  it('counts rows where every cell is missing', () => {
    const report = diagnose(emptyRowsDataset());

    expect(report.empty_row_count).toBe(2);
    expect(findEmptyRowIndices(emptyRowsDataset())).toEqual([1, 3]);
  });

  it('leaves disabled checks out of the report', () => {
    const config = resolveDiagnosticsConfig({ empty_columns: false, mixed_types: false });
    const report = diagnose(emptyColumnsDataset(), config);

    expect('empty_columns' in report).toBe(false);
    expect('mixed_type_columns' in report).toBe(false);
    expect(report.empty_row_count).toBe(0);
    expect(report.headers_missing_suspected).toBe(false);
  });

  it('produces only the shape fields when every check is off', () => {
    const config = resolveDiagnosticsConfig({
      empty_columns: false,
      empty_rows: false,
      missing_headers: false,
      mixed_types: false
    });

    expect(Object.keys(diagnose(goodDataset(), config))).toEqual(['row_count', 'column_count', 'column_names']);
  });

  it('does not modify the dataset', () => {
    const dataset = mixedTypesDataset();
    const before = structuredClone(dataset);

    diagnose(dataset);

    expect(dataset).toEqual(before);
  });
});

describe('degenerate tables', () => {
  it('reports every column as empty when there are no rows', () => {
    const dataset = datasetFromRows(['A', 'B'], []);
    const report = diagnose(dataset);

    expect(report.empty_columns).toEqual(['A', 'B']);
    expect(report.empty_row_count).toBe(0);
    expect(report.mixed_type_columns).toEqual({});
  });

  it('counts no empty rows when there are no columns', () => {
    const withRows: TabularDataset = { columns: [], rowCount: 4 };
    const withoutRows: TabularDataset = { columns: [], rowCount: 0 };

    expect(countEmptyRows(withRows)).toBe(0);
    expect(countEmptyRows(withoutRows)).toBe(0);
    expect(diagnose(withRows)).toEqual({
      row_count: 4,
      column_count: 0,
      column_names: [],
      empty_columns: [],
      empty_row_count: 0,
      mixed_type_columns: {},
      headers_missing_suspected: false
    });
  });
});

describe('mixed-type detection', () => {
  it('ignores missing cells when counting kinds', () => {
    const dataset = datasetFromRows(['Score'], [[1], [null], [3], [null]]);

    expect(kindHistogram(dataset.columns[0])).toEqual({ integer: 2 });
    expect(diagnose(dataset).mixed_type_columns).toEqual({});
  });

  it('never reports a fully missing column', () => {
    const dataset = datasetFromRows(['Empty', 'Mixed'], [[null, 1], [null, 'one']]);

    expect(diagnose(dataset).mixed_type_columns).toEqual({ Mixed: { integer: 1, string: 1 } });
  });

  it('treats numeric text and numbers as different kinds', () => {
    const dataset = datasetFromRows(['Code'], [['3'], [3]]);

    expect(diagnose(dataset).mixed_type_columns).toEqual({ Code: { integer: 1, string: 1 } });
  });

  it('separates integers, floats and booleans', () => {
    const dataset = datasetFromRows(['Flag'], [[1], [1.5], [true], [false]]);

    expect(diagnose(dataset).mixed_type_columns).toEqual({
      Flag: { integer: 1, float: 1, boolean: 2 }
    });
  });
});

describe('isPlaceholderColumnName', () => {
  it('matches only the loader placeholder pattern', () => {
    expect(isPlaceholderColumnName('Column_0')).toBe(true);
    expect(isPlaceholderColumnName('Column_12')).toBe(true);
    expect(isPlaceholderColumnName('Column 1')).toBe(false);
    expect(isPlaceholderColumnName('Column_A')).toBe(false);
    expect(isPlaceholderColumnName('Name')).toBe(false);
  });
});
