import { describe, it, expect } from 'vitest';
import { DataFactory, Store } from 'n3';
import { buildEntityIndex, collectNamedEntities, firstWriteWins, lastWriteWins } from '../graph/entity-index.js';
import { EntityMatcher } from '../graph/matcher.js';
import { sequenceRatio } from '../nlp/similarity.js';
import type { EntityRef } from '../types/index.js';

const { namedNode, blankNode, literal, quad } = DataFactory;

const TGR = 'http://tolkiengateway.semanticweb.org/resource/';
const SCHEMA_NAME = 'http://schema.org/name';

const gandalf = namedNode(`${TGR}Gandalf`);
const aragorn = namedNode(`${TGR}Aragorn`);

describe('Entity Index', () => {
    it('should insert normalized and compact keys for each name', () => {
        const index = buildEntityIndex([
            { entity: gandalf, name: 'Gandalf' },
            { entity: aragorn, name: 'Aragorn II' },
        ]);

        expect([...index.keys()]).toEqual(['gandalf', 'aragorn ii', 'aragornii']);
        expect(index.get('aragornii')).toBe(aragorn);
    });

    it('should skip empty names', () => {
        const index = buildEntityIndex([{ entity: gandalf, name: '' }]);
        expect(index.size).toBe(0);
    });

    it('should let the later entity win a key collision by default', () => {
        const index = buildEntityIndex([
            { entity: gandalf, name: 'Mithrandir' },
            { entity: aragorn, name: 'MITHRANDIR' },
        ]);
        expect(index.get('mithrandir')).toBe(aragorn);
    });

    it('should honour an explicit conflict policy', () => {
        const entries = [
            { entity: gandalf, name: 'Mithrandir' },
            { entity: aragorn, name: 'Mithrandir' },
        ];
        expect(buildEntityIndex(entries, firstWriteWins).get('mithrandir')).toBe(gandalf);
        expect(buildEntityIndex(entries, lastWriteWins).get('mithrandir')).toBe(aragorn);
    });

    describe('collectNamedEntities', () => {
        it('should enumerate literal names of named and blank nodes', () => {
            const nameless = blankNode('b0');
            const store = new Store([
                quad(gandalf, namedNode(SCHEMA_NAME), literal('Gandalf', 'en')),
                quad(aragorn, namedNode(SCHEMA_NAME), literal('Aragorn')),
                quad(nameless, namedNode(SCHEMA_NAME), literal('Nameless')),
                quad(namedNode(`${TGR}Frodo`), namedNode('http://www.w3.org/2000/01/rdf-schema#label'), literal('Frodo')),
                quad(namedNode(`${TGR}Shire`), namedNode(SCHEMA_NAME), namedNode(`${TGR}ShireName`)),
            ]);

            const names = [...collectNamedEntities(store, [SCHEMA_NAME])].map((entry) => entry.name).sort();
            expect(names).toEqual(['Aragorn', 'Gandalf', 'Nameless']);
        });
    });
});

describe('EntityMatcher', () => {
    const matcher = new EntityMatcher(
        buildEntityIndex([
            { entity: gandalf, name: 'Gandalf' },
            { entity: aragorn, name: 'Aragorn' },
        ])
    );

    describe('exact matching', () => {
        it('should match a lowercase candidate exactly', () => {
            expect(matcher.match('gandalf')).toBe(gandalf);
            expect(matcher.matchDetailed('gandalf')).toEqual({ entity: gandalf, key: 'gandalf', score: 1, method: 'exact' });
        });

        it('should match any casing of an indexed name', () => {
            const people = [
                { entity: gandalf, name: 'Gandalf' },
                { entity: aragorn, name: 'Tom Bombadil' },
                { entity: namedNode(`${TGR}Eowyn`), name: 'Éowyn' },
            ];
            const local = new EntityMatcher(buildEntityIndex(people));

            for (const { entity, name } of people) {
                expect(local.match(name)).toBe(entity);
                expect(local.match(name.toUpperCase())).toBe(entity);
                expect(local.match(name.toLowerCase())).toBe(entity);
            }
        });

        it('should match a name written without spaces through the compact key', () => {
            const local = new EntityMatcher(buildEntityIndex([{ entity: gandalf, name: 'Tom Bombadil' }]));
            expect(local.matchDetailed('TomBombadil')?.method).toBe('exact');
        });

        it('should prefer an exact key over an earlier fuzzy key scoring 1.0', () => {
            // The raw key 'Gandalf' would score 1.0 in the fuzzy scan and is seen first
            const local = new EntityMatcher(
                new Map<string, EntityRef>([
                    ['Gandalf', gandalf],
                    ['gandalf', aragorn],
                ])
            );
            expect(local.matchDetailed('GANDALF')).toEqual({ entity: aragorn, key: 'gandalf', score: 1, method: 'exact' });
        });
    });

    describe('fuzzy matching', () => {
        it('should match a close misspelling above the threshold', () => {
            const match = matcher.matchDetailed('Gandalff');
            expect(match?.entity).toBe(gandalf);
            expect(match?.method).toBe('fuzzy');
            expect(match?.score).toBeCloseTo(14 / 15, 10);
        });

        it('should reject a candidate scoring below the threshold', () => {
            // "Gandalph" scores 0.8 against "gandalf"
            expect(matcher.match('Gandalph')).toBeNull();
            expect(matcher.match('Gandalph', 0.85)).toBeNull();
        });

        it('should accept a score equal to the threshold', () => {
            expect(matcher.matchDetailed('Gandalph', 0.8)).toEqual({ entity: gandalf, key: 'gandalf', score: 0.8, method: 'fuzzy' });
        });

        it('should return null for an unrelated name', () => {
            expect(matcher.match('Bilbo')).toBeNull();
        });

        it('should return null for an empty candidate at any threshold', () => {
            expect(matcher.match('', 0)).toBeNull();
        });

        it('should keep the first key on equal scores', () => {
            const first = new EntityMatcher(
                buildEntityIndex([
                    { entity: gandalf, name: 'Gandalf' },
                    { entity: aragorn, name: 'Gandalv' },
                ])
            );
            const second = new EntityMatcher(
                buildEntityIndex([
                    { entity: aragorn, name: 'Gandalv' },
                    { entity: gandalf, name: 'Gandalf' },
                ])
            );

            // Both keys score 12/14 against "gandalx"
            expect(first.match('Gandalx')).toBe(gandalf);
            expect(second.match('Gandalx')).toBe(aragorn);
        });

        it('should never return a match scoring below the threshold', () => {
            const local = new EntityMatcher(
                buildEntityIndex([
                    { entity: gandalf, name: 'Gandalf the Grey' },
                    { entity: aragorn, name: 'Aragorn son of Arathorn' },
                    { entity: namedNode(`${TGR}Frodo`), name: 'Frodo Baggins' },
                ])
            );
            const candidates = ['Gandalf', 'Frodo', 'Aragorn', 'Frodo Bagins', 'Gandalf Grey', 'Sam'];
            const thresholds = [0, 0.25, 0.5, 0.75, 0.85, 0.95, 1];

            for (const candidate of candidates) {
                for (const threshold of thresholds) {
                    const match = local.matchDetailed(candidate, threshold);
                    if (!match) continue;
                    expect(match.score).toBeGreaterThanOrEqual(threshold);
                    expect(sequenceRatio(candidate, match.key)).toBe(match.score);
                }
            }
        });
    });

    it('should report the index size', () => {
        expect(matcher.size).toBe(2);
    });
});
