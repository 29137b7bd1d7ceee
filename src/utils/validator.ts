/**
 * Input validation for CLI options
 */

import { ReleaseKind } from '../types';
import { parseDayPrecisionDate } from './calendar';
import { AppError, ErrorType } from './error-handler';
import { DEFAULT_RELEASE_KINDS, parseReleaseKinds } from './release-kinds';

export const MAX_PREVIOUS_WEEKS = 520;

/**
 * Validation error naming the offending option
 */
export class ValidationError extends AppError {
    constructor(public field: string, public reason: string) {
        super(ErrorType.ValidationError, `${field}: ${reason}`);
        this.name = 'ValidationError';
        Object.setPrototypeOf(this, ValidationError.prototype);
    }
}

export type RawOptions = Record<string, unknown>;

export interface WeekQuery {
    date?: Date;
    previousWeeks: number;
}

export interface ReleaseQuery extends WeekQuery {
    kinds: ReleaseKind[];
}

export interface ArtistsOptions {
    update: boolean;
    force: boolean;
    search?: string;
}

export interface ReleasesOptions extends ReleaseQuery {
    update: boolean;
    force: boolean;
}

export interface InfoOptions extends WeekQuery {
    releaseWeek: boolean;
    artists: boolean;
    state: boolean;
}

export class Validator {
    static validateArtistsOptions(options: RawOptions): ArtistsOptions {
        const search = options.search === undefined ? undefined : this.validateString(options.search, '--search', 1, 100);
        return {
            update: options.update === true,
            force: options.force === true,
            search,
        };
    }

    static validateReleasesOptions(options: RawOptions): ReleasesOptions {
        return {
            update: options.update === true,
            force: options.force === true,
            ...this.validateReleaseQuery(options),
        };
    }

    static validatePlaylistOptions(options: RawOptions): ReleaseQuery {
        return this.validateReleaseQuery(options);
    }

    /**
     * With no flag set, info shows everything
     */
    static validateInfoOptions(options: RawOptions): InfoOptions {
        const releaseWeek = options.releaseWeek === true;
        const artists = options.artists === true;
        const state = options.state === true;
        const all = !releaseWeek && !artists && !state;
        return {
            releaseWeek: releaseWeek || all,
            artists: artists || all,
            state: state || all,
            ...this.validateWeekQuery(options),
        };
    }

    static validateReleaseQuery(options: RawOptions): ReleaseQuery {
        let kinds: ReleaseKind[] = DEFAULT_RELEASE_KINDS;
        if (options.type !== undefined) {
            const raw = this.validateString(options.type, '--type', 0, 200);
            try {
                kinds = parseReleaseKinds(raw);
            } catch (error) {
                throw new ValidationError('--type', error instanceof Error ? error.message : String(error));
            }
        }
        return { kinds, ...this.validateWeekQuery(options) };
    }

    static validateWeekQuery(options: RawOptions): WeekQuery {
        const query: WeekQuery = {
            previousWeeks: options.previousWeeks === undefined ? 0 : this.validatePreviousWeeks(options.previousWeeks),
        };
        if (options.date !== undefined) {
            query.date = this.validateDate(options.date, '--date');
        }
        return query;
    }

    static validateDate(value: unknown, fieldName: string): Date {
        const raw = this.validateString(value, fieldName, 1, 10);
        const date = parseDayPrecisionDate(raw);
        if (!date) {
            throw new ValidationError(fieldName, `Expected a date as YYYY-MM-DD, got "${raw}"`);
        }
        return date;
    }

    static validatePreviousWeeks(value: unknown): number {
        return this.validateNumber(value, '--previous-weeks', 0, MAX_PREVIOUS_WEEKS);
    }

    static validateString(value: unknown, fieldName: string, minLength: number = 1, maxLength: number = 500): string {
        if (typeof value !== 'string') {
            throw new ValidationError(fieldName, 'Must be a string');
        }
        const trimmed = value.trim();
        if (trimmed.length < minLength) {
            throw new ValidationError(fieldName, `Must be at least ${minLength} characters`);
        }
        if (trimmed.length > maxLength) {
            throw new ValidationError(fieldName, `Must be ${maxLength} characters or less`);
        }
        return trimmed;
    }

    static validateNumber(value: unknown, fieldName: string, min: number = 0, max: number = Number.MAX_SAFE_INTEGER): number {
        const num = typeof value === 'string' && /^\s*-?\d+\s*$/.test(value) ? parseInt(value, 10) : value;
        if (typeof num !== 'number' || !Number.isInteger(num)) {
            throw new ValidationError(fieldName, 'Must be a whole number');
        }
        if (num < min || num > max) {
            throw new ValidationError(fieldName, `Must be between ${min} and ${max}`);
        }
        return num;
    }
}
