import { describe, it, expect } from 'vitest';
import { APPLICANT_PROFILES, DataGenerator } from '../data_generator';
import { ClassifierAdapter, loadCreditModel, validateApplicationFeatures } from '../../engine/classifier_adapter';
import { screenForFraud } from '../../engine/fraud_screen';

describe('DataGenerator', () => {
    it('is deterministic for a profile and seed', () => {
        expect(DataGenerator.generateApplication('borderline', 9)).toEqual(DataGenerator.generateApplication('borderline', 9));
        expect(DataGenerator.generateApplication('borderline', 9)).not.toEqual(DataGenerator.generateApplication('borderline', 10));
    });

    it('cycles through the profiles with sequential ids', () => {
        const batch = DataGenerator.generateBatch(6, 3);
        expect(batch.map(b => b.expected.profile)).toEqual(['prime', 'borderline', 'subprime', 'flagged', 'prime', 'borderline']);
        expect(batch.map(b => b.expected.applicationId)).toEqual([
            'synthetic-0000',
            'synthetic-0001',
            'synthetic-0002',
            'synthetic-0003',
            'synthetic-0004',
            'synthetic-0005'
        ]);
    });

    it('only produces records the classifier accepts unchanged', () => {
        for (const { features } of DataGenerator.generateBatch(40)) {
            expect(validateApplicationFeatures(features)).toEqual(features);
        }
    });

    it('plants a hard fraud signal exactly when a block is expected', () => {
        const outcomes = Array.from({ length: 40 }, (_, seed) => DataGenerator.generateApplication('flagged', seed))
            .map(({ features, expected }) => ({ expected, fraud: screenForFraud(features) }));

        for (const { expected, fraud } of outcomes) {
            expect(fraud.decision).toBe(expected.expectBlocked ? 'BLOCK' : 'PASS');
            if (!expected.expectBlocked) {
                expect(fraud.flags.map(f => f.name)).toEqual(expect.arrayContaining([
                    'geo_location_mismatch',
                    'rapid_multiple_applications',
                    'income_inflation_moderate'
                ]));
            }
        }
        expect(outcomes.some(o => o.expected.expectBlocked)).toBe(true);
        expect(outcomes.some(o => !o.expected.expectBlocked)).toBe(true);
    });

    it('orders profiles by average default risk', () => {
        const classifier = new ClassifierAdapter(loadCreditModel());
        const meanPd = (profile: typeof APPLICANT_PROFILES[number]) => {
            const pds = Array.from({ length: 30 }, (_, seed) => classifier.score(DataGenerator.generateApplication(profile, seed).features));
            return pds.reduce((sum, p) => sum + p, 0) / pds.length;
        };
        expect(meanPd('prime')).toBeLessThan(meanPd('borderline'));
        expect(meanPd('borderline')).toBeLessThan(meanPd('subprime'));
    });
});
