import { describe, it } from 'node:test';
import assert from 'node:assert';
import { getBundledAllergenOntology, loadAllergenOntology } from './allergenOntology.loader';
import { AppError } from '@/src/lib/errors/app-error';

function isOntologyError(error: unknown): boolean {
  return error instanceof AppError && error.code === 'ONTOLOGY_INVALID';
}

describe('loadAllergenOntology', () => {
  it('normalizes names and members and builds the reverse index', () => {
    const ontology = loadAllergenOntology({
      version: 3,
      groups: [{ name: ' Nut Oil ', members: ['Almond Oil', 'almond oil', 'Walnut Oil'] }],
    });

    assert.strictEqual(ontology.version, 3);
    assert.deepStrictEqual(ontology.groups.get('nut oil')?.members, ['almond oil', 'walnut oil']);
    assert.strictEqual(ontology.reverseIndex.get('almond oil'), 'nut oil');
    assert.strictEqual(ontology.reverseIndex.get('nut oil'), 'nut oil');
  });

  it('rejects a member listed under two groups', () => {
    assert.throws(
      () =>
        loadAllergenOntology({
          version: 1,
          groups: [
            { name: 'aha', members: ['citric acid'] },
            { name: 'preservative', members: ['citric acid', 'sorbic acid'] },
          ],
        }),
      (error: unknown) =>
        isOntologyError(error) &&
        error instanceof Error &&
        error.message.includes('"citric acid" belongs to both "aha" and "preservative"'),
    );
  });

  it('rejects a group name that is another group member', () => {
    assert.throws(
      () =>
        loadAllergenOntology({
          version: 1,
          groups: [
            { name: 'fragrance', members: ['parfum', 'linalool'] },
            { name: 'linalool', members: ['linalyl acetate'] },
          ],
        }),
      isOntologyError,
    );
  });

  it('rejects duplicate group names', () => {
    assert.throws(
      () =>
        loadAllergenOntology({
          version: 1,
          groups: [
            { name: 'sulfate', members: ['sls'] },
            { name: 'Sulfate', members: ['sles'] },
          ],
        }),
      isOntologyError,
    );
  });

  it('rejects malformed input', () => {
    assert.throws(() => loadAllergenOntology({ version: 0, groups: [] }), isOntologyError);
    assert.throws(() => loadAllergenOntology('paraben'), isOntologyError);
  });
});

describe('getBundledAllergenOntology', () => {
  it('loads the bundled resource', () => {
    const ontology = getBundledAllergenOntology();

    assert.strictEqual(ontology.version, 1);
    assert.strictEqual(ontology.groups.size, 13);
    assert.strictEqual(ontology.reverseIndex.get('sls'), 'sulfate');
    assert.strictEqual(ontology.reverseIndex.get('paraffinum liquidum'), 'mineral oil');
  });

  it('returns the same instance on every call', () => {
    assert.strictEqual(getBundledAllergenOntology(), getBundledAllergenOntology());
  });
});
