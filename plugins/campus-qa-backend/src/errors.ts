/*
 * Copyright (C) 2025-2026 flickleafy
 *
 * This program is free software: you can redistribute it and/or modify
 * it under the terms of the GNU General Public License as published by
 * the Free Software Foundation, either version 3 of the License, or
 * (at your option) any later version.
 *
 * This program is distributed in the hope that it will be useful,
 * but WITHOUT ANY WARRANTY; without even the implied warranty of
 * MERCHANTABILITY or FITNESS FOR A PARTICULAR PURPOSE. See the
 * GNU General Public License for more details.
 *
 * You should have received a copy of the GNU General Public License
 * along with this program. If not, see <https://www.gnu.org/licenses/>.
 */

/**
 * Error taxonomy shared by ingestion and serving
 *
 * @packageDocumentation
 */

import { CustomErrorBase } from '@backstage/errors';

/**
 * Invalid caller input or configuration
 */
export class ValidationError extends CustomErrorBase {
  name = 'ValidationError' as const;
}

/**
 * A vector's length disagrees with the dimension established for an index
 */
export class DimensionMismatchError extends CustomErrorBase {
  name = 'DimensionMismatchError' as const;

  constructor(
    readonly expected: number,
    readonly actual: number,
    context?: string,
  ) {
    super(
      `Embedding dimension mismatch${context ? ` (${context})` : ''}: expected ${expected}, got ${actual}`,
    );
  }
}

/**
 * Embedding or generation backend failure
 */
export class ExternalModelError extends CustomErrorBase {
  name = 'ExternalModelError' as const;
}

/**
 * Vector store persistence failure
 */
export class StoreIOError extends CustomErrorBase {
  name = 'StoreIOError' as const;
}

/**
 * The service was used before initialize() completed
 */
export class ServiceNotReadyError extends CustomErrorBase {
  name = 'ServiceNotReadyError' as const;
}
