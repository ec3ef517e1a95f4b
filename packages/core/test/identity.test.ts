import { expect } from 'chai';
import { inspect } from 'util';
import { createHash } from 'crypto';
import {
  createIdentity,
  deriveScalar,
  Identity,
  NULLIFIER_DOMAIN,
  TRAPDOOR_DOMAIN,
} from '../src/identity';
import { poseidonHash } from '../src/poseidon';
import { InvalidSeedError } from '../src/errors';
import { BN254_FIELD_ORDER } from '../src/validation';

describe('Identity', () => {
  describe('create', () => {
    it('should derive the same identity from the same seed', async () => {
      const first = await Identity.create('test-seed');
      const second = await Identity.create('test-seed');

      expect(first.commitment).to.equal(second.commitment);
      expect(first.trapdoor).to.equal(second.trapdoor);
      expect(first.nullifier).to.equal(second.nullifier);
      expect(first.publicKey).to.deep.equal(second.publicKey);
    });

    it('should derive different identities from different seeds', async () => {
      const first = await Identity.create('test-seed-1');
      const second = await Identity.create('test-seed-2');
      expect(first.commitment).to.not.equal(second.commitment);
    });

    it('should commit to Poseidon(trapdoor, nullifier)', async () => {
      const identity = await Identity.create('test-seed');
      const expected = await poseidonHash([identity.trapdoor, identity.nullifier]);
      expect(identity.commitment).to.equal(expected);
    });

    it('should derive trapdoor and nullifier under separate domains', async () => {
      const identity = await Identity.create('test-seed');
      const seed = new Uint8Array(Buffer.from('test-seed', 'utf8'));

      expect(identity.trapdoor).to.equal(deriveScalar(seed, TRAPDOOR_DOMAIN));
      expect(identity.nullifier).to.equal(deriveScalar(seed, NULLIFIER_DOMAIN));
      expect(identity.trapdoor).to.not.equal(identity.nullifier);
    });

    it('should treat a string seed and its UTF-8 bytes alike', async () => {
      const fromString = await Identity.create('test-seed');
      const fromBytes = await Identity.create(new Uint8Array(Buffer.from('test-seed', 'utf8')));
      expect(fromString.commitment).to.equal(fromBytes.commitment);
    });

    it('should draw a random seed when none is given', async () => {
      const first = await createIdentity();
      const second = await createIdentity();
      expect(first.commitment).to.not.equal(second.commitment);
    });

    it('should reject an empty string seed', async () => {
      try {
        await Identity.create('');
        expect.fail('Expected InvalidSeedError');
      } catch (error) {
        expect(error).to.be.instanceOf(InvalidSeedError);
      }
    });

    it('should reject an empty byte seed', async () => {
      try {
        await Identity.create(new Uint8Array(0));
        expect.fail('Expected InvalidSeedError');
      } catch (error) {
        expect(error).to.be.instanceOf(InvalidSeedError);
      }
    });
  });

  describe('deriveScalar', () => {
    it('should reduce SHA-256(tag || 0x00 || seed) modulo the field order', () => {
      const seed = new Uint8Array([1, 2, 3]);
      const digest = createHash('sha256')
        .update(Buffer.concat([Buffer.from('tag', 'utf8'), Buffer.from([0]), Buffer.from(seed)]))
        .digest('hex');

      expect(deriveScalar(seed, 'tag')).to.equal(BigInt('0x' + digest) % BN254_FIELD_ORDER);
    });
  });

  describe('export / import', () => {
    it('should restore the same identity', async () => {
      const identity = await Identity.create('test-seed');
      const exported = identity.export();

      expect(exported).to.equal(Buffer.from('test-seed', 'utf8').toString('base64'));
      const restored = await Identity.import(exported);
      expect(restored.commitment).to.equal(identity.commitment);
      expect(restored.publicKey).to.deep.equal(identity.publicKey);
    });

    it('should reject text that is not base64', async () => {
      try {
        await Identity.import('not base64!');
        expect.fail('Expected InvalidSeedError');
      } catch (error) {
        expect(error).to.be.instanceOf(InvalidSeedError);
      }
    });
  });

  describe('public views', () => {
    it('should serialize only the public values', async () => {
      const identity = await Identity.create('test-seed');
      const json = JSON.parse(JSON.stringify(identity));

      expect(Object.keys(json)).to.deep.equal(['commitment', 'publicKey']);
      expect(json.commitment).to.equal(identity.commitment.toString());
      expect(json.publicKey).to.deep.equal([
        identity.publicKey[0].toString(),
        identity.publicKey[1].toString(),
      ]);
    });

    it('should not show secrets when inspected', async () => {
      const identity = await Identity.create('test-seed');
      expect(inspect(identity)).to.equal(`Identity { commitment: ${identity.commitment} }`);
    });
  });
});
