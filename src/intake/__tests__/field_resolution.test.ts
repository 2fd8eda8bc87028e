import { describe, it, expect } from 'vitest';
import { DECLARED_DEFAULTS, coerceNumeric, resolveApplicationFields } from '../field_resolution';
import { validateApplicationFeatures } from '../../engine/classifier_adapter';

describe('Field resolution', () => {
    describe('coerceNumeric', () => {
        it.each([
            [' 680 ', 680],
            ['3,500', 3500],
            ['0.35', 0.35],
            ['', undefined],
            ['   ', undefined],
            ['abc', 'abc'],
            [42, 42],
            [null, null]
        ])('%o -> %o', (input, expected) => {
            expect(coerceNumeric(input)).toBe(expected);
        });
    });

    it('prefers extracted values over user input over defaults', () => {
        const { values, sources } = resolveApplicationFields({
            extracted: { credit_score: '700' },
            userSupplied: { credit_score: 680, monthly_income: '3,500' }
        });
        expect(values.credit_score).toBe(700);
        expect(values.monthly_income).toBe(3500);
        expect(values.document_mismatch_flag).toBe(0);
        expect(sources.credit_score).toBe('extracted');
        expect(sources.monthly_income).toBe('user');
        expect(sources.document_mismatch_flag).toBe('default');
    });

    it('leaves fields without any source out of the record', () => {
        const { values, sources } = resolveApplicationFields({ userSupplied: {} });
        expect('age' in values).toBe(false);
        expect(sources.age).toBe('missing');
        expect(Object.keys(values).sort()).toEqual(Object.keys(DECLARED_DEFAULTS).sort());
    });

    it('treats null and blank values as absent', () => {
        const { values, sources } = resolveApplicationFields({
            extracted: { credit_score: null, monthly_income: '' },
            userSupplied: { credit_score: 650, monthly_income: 2900 }
        });
        expect(values.credit_score).toBe(650);
        expect(values.monthly_income).toBe(2900);
        expect(sources.credit_score).toBe('user');
    });

    it('keeps non-numeric values for validation to report', () => {
        const { values } = resolveApplicationFields({ extracted: { monthly_income: 'a lot' } });
        expect(values.monthly_income).toBe('a lot');
    });

    it('honours custom defaults', () => {
        const { values, sources } = resolveApplicationFields({ userSupplied: {}, defaults: { age: 40 } });
        expect(values).toEqual({ age: 40 });
        expect(sources.document_mismatch_flag).toBe('missing');
    });

    it('reports unknown keys once and ignores underscore metadata', () => {
        const { unknownFields } = resolveApplicationFields({
            extracted: { nickname: 'x', _ocr_confidence: 0.9 },
            userSupplied: { nickname: 'y', shoe_size: 42, age: 30 }
        });
        expect(unknownFields).toEqual(['nickname', 'shoe_size']);
    });

    it('produces a record the classifier accepts once applicant fields are supplied', () => {
        const { values } = resolveApplicationFields({
            userSupplied: {
                age: '35',
                education_level: 2,
                employment_type: 2,
                employment_years: 5,
                monthly_income: '3,500',
                fixed_monthly_expenses: 1200,
                debt_to_income_ratio: 0.3,
                savings_balance: 8000,
                loan_amount: '15,000',
                loan_duration_months: 36,
                loan_purpose: 0,
                credit_score: 680,
                utility_bill_on_time_ratio: 0.95
            }
        });
        const features = validateApplicationFeatures(values);
        expect(features.monthly_income).toBe(3500);
        expect(features.loan_amount).toBe(15000);
        expect(features.application_velocity).toBe(1);
        expect(features.metadata_anomaly_score).toBe(0);
    });
});
