/**
 * Matrix - dense 2-D container of doubles in row-major order
 *
 * Element (i, j) lives at data[i * cols + j]. Every operation returns a new
 * Matrix; only subtractInPlace writes into its receiver, for the network's
 * weight and bias updates.
 */

import { DimensionMismatchError } from '../errors.js';
import { defaultRandom, type RandomSource } from './random.js';

export interface MatrixRecord {
  rows: number;
  cols: number;
  data: number[];
}

export class Matrix {
  readonly rows: number;
  readonly cols: number;
  readonly data: Float64Array;

  constructor(rows: number, cols: number, data?: ArrayLike<number>) {
    if (!Number.isInteger(rows) || !Number.isInteger(cols) || rows < 1 || cols < 1) {
      throw new DimensionMismatchError(`Invalid matrix shape ${rows}x${cols}`);
    }
    if (data && data.length !== rows * cols) {
      throw new DimensionMismatchError(
        `Matrix ${rows}x${cols} needs ${rows * cols} values, got ${data.length}`
      );
    }
    this.rows = rows;
    this.cols = cols;
    this.data = data ? Float64Array.from(data) : new Float64Array(rows * cols);
  }

  static zeros(rows: number, cols: number): Matrix {
    return new Matrix(rows, cols);
  }

  /**
   * Uniform values in [0, 1), drawn in row-major order
   */
  static random(rows: number, cols: number, random: RandomSource = defaultRandom): Matrix {
    const matrix = new Matrix(rows, cols);
    for (let i = 0; i < matrix.data.length; i++) {
      matrix.data[i] = random();
    }
    return matrix;
  }

  /**
   * Column vector from a flat list of values
   */
  static fromArray(values: readonly number[]): Matrix {
    return new Matrix(values.length, 1, values);
  }

  static fromRows(rows: readonly (readonly number[])[]): Matrix {
    const cols = rows[0]?.length ?? 0;
    const data: number[] = [];
    for (const row of rows) {
      if (row.length !== cols) {
        throw new DimensionMismatchError(`Ragged rows: expected ${cols} columns, got ${row.length}`);
      }
      data.push(...row);
    }
    return new Matrix(rows.length, cols, data);
  }

  static fromRecord(record: MatrixRecord): Matrix {
    return new Matrix(record.rows, record.cols, record.data);
  }

  get shape(): string {
    return `${this.rows}x${this.cols}`;
  }

  get(row: number, col: number): number {
    if (row < 0 || row >= this.rows || col < 0 || col >= this.cols) {
      throw new DimensionMismatchError(`Index (${row}, ${col}) outside ${this.shape} matrix`);
    }
    return this.data[row * this.cols + col];
  }

  add(other: Matrix): Matrix {
    this.assertSameShape(other, 'add');
    const result = new Matrix(this.rows, this.cols);
    for (let i = 0; i < this.data.length; i++) {
      result.data[i] = this.data[i] + other.data[i];
    }
    return result;
  }

  subtract(other: Matrix): Matrix {
    this.assertSameShape(other, 'subtract');
    const result = new Matrix(this.rows, this.cols);
    for (let i = 0; i < this.data.length; i++) {
      result.data[i] = this.data[i] - other.data[i];
    }
    return result;
  }

  /**
   * Element-wise product
   */
  hadamard(other: Matrix): Matrix {
    this.assertSameShape(other, 'hadamard');
    const result = new Matrix(this.rows, this.cols);
    for (let i = 0; i < this.data.length; i++) {
      result.data[i] = this.data[i] * other.data[i];
    }
    return result;
  }

  dot(other: Matrix): Matrix {
    if (this.cols !== other.rows) {
      throw new DimensionMismatchError(
        `Cannot multiply ${this.shape} by ${other.shape}: ${this.cols} columns vs ${other.rows} rows`
      );
    }
    const result = new Matrix(this.rows, other.cols);
    for (let i = 0; i < this.rows; i++) {
      for (let j = 0; j < other.cols; j++) {
        let sum = 0;
        for (let k = 0; k < this.cols; k++) {
          sum += this.data[i * this.cols + k] * other.data[k * other.cols + j];
        }
        result.data[i * other.cols + j] = sum;
      }
    }
    return result;
  }

  transpose(): Matrix {
    const result = new Matrix(this.cols, this.rows);
    for (let i = 0; i < this.rows; i++) {
      for (let j = 0; j < this.cols; j++) {
        result.data[j * this.rows + i] = this.data[i * this.cols + j];
      }
    }
    return result;
  }

  map(fn: (value: number, row: number, col: number) => number): Matrix {
    const result = new Matrix(this.rows, this.cols);
    for (let i = 0; i < this.data.length; i++) {
      result.data[i] = fn(this.data[i], Math.floor(i / this.cols), i % this.cols);
    }
    return result;
  }

  scale(factor: number): Matrix {
    return this.map((value) => value * factor);
  }

  /**
   * Overwrites this matrix with this - other
   */
  subtractInPlace(other: Matrix): void {
    this.assertSameShape(other, 'subtract');
    for (let i = 0; i < this.data.length; i++) {
      this.data[i] -= other.data[i];
    }
  }

  equals(other: Matrix): boolean {
    if (this.rows !== other.rows || this.cols !== other.cols) return false;
    for (let i = 0; i < this.data.length; i++) {
      if (!Object.is(this.data[i], other.data[i])) return false;
    }
    return true;
  }

  clone(): Matrix {
    return new Matrix(this.rows, this.cols, this.data);
  }

  toArray(): number[] {
    return Array.from(this.data);
  }

  toRows(): number[][] {
    const rows: number[][] = [];
    for (let i = 0; i < this.rows; i++) {
      rows.push(Array.from(this.data.subarray(i * this.cols, (i + 1) * this.cols)));
    }
    return rows;
  }

  toRecord(): MatrixRecord {
    return { rows: this.rows, cols: this.cols, data: this.toArray() };
  }

  private assertSameShape(other: Matrix, operation: string): void {
    if (this.rows !== other.rows || this.cols !== other.cols) {
      throw new DimensionMismatchError(
        `Cannot ${operation} ${this.shape} and ${other.shape} matrices`
      );
    }
  }
}
