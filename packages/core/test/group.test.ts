import { expect } from 'chai';
import { createGroup, Group, importGroup } from '../src/group';
import { getPoseidon2, HashFunction } from '../src/poseidon';
import {
  DuplicateMemberError,
  EmptyMemberError,
  IndexOutOfRangeError,
  RemovedMemberError,
  SignetValidationError,
} from '../src/errors';
import { BN254_FIELD_ORDER } from '../src/validation';

const hash: HashFunction = (left, right) => left * 1000n + right;

describe('Group', () => {
  describe('constructor', () => {
    it('should build an empty group', () => {
      const group = new Group(hash);
      expect(group.root).to.be.undefined;
      expect(group.size).to.equal(0);
      expect(group.depth).to.equal(0);
      expect(group.members).to.deep.equal([]);
    });

    it('should accept bigint, number, decimal and hex members', () => {
      const group = new Group(hash, [1n, 2, '3', '0x4']);
      expect(group.members).to.deep.equal([1n, 2n, 3n, 4n]);
    });

    it('should reject repeated members', () => {
      expect(() => new Group(hash, [1n, 2n, 1n])).to.throw(
        DuplicateMemberError,
        /Member 1 is already/,
      );
    });

    it('should reject the zero sentinel', () => {
      expect(() => new Group(hash, [1n, 0n])).to.throw(EmptyMemberError);
    });

    it('should reject values outside the field', () => {
      expect(() => new Group(hash, [BN254_FIELD_ORDER])).to.throw(SignetValidationError);
    });

    it('should reject text members', () => {
      expect(() => new Group(hash, ['alice'])).to.throw(SignetValidationError, /Member must be/);
    });
  });

  describe('addMember / addMembers', () => {
    it('should grow the depth as members are added', () => {
      const group = new Group(hash);
      const depths: number[] = [];
      for (const member of [1n, 2n, 3n, 4n, 5n]) {
        group.addMember(member);
        depths.push(group.depth);
      }
      expect(depths).to.deep.equal([0, 1, 2, 2, 3]);
      expect(group.root).to.equal(1005004005n);
    });

    it('should reject a member already present', () => {
      const group = new Group(hash, [1n, 2n]);
      expect(() => group.addMember(2n)).to.throw(DuplicateMemberError);
      expect(group.size).to.equal(2);
    });

    it('should add a batch with the same root as one-by-one inserts', () => {
      const batch = new Group(hash, [1n]);
      batch.addMembers([2n, 3n, 4n, 5n]);

      const single = new Group(hash);
      [1n, 2n, 3n, 4n, 5n].forEach((m) => single.addMember(m));

      expect(batch.root).to.equal(single.root);
      expect(batch.indexOf(4n)).to.equal(3);
    });

    it('should insert nothing when a batch holds a duplicate', () => {
      const group = new Group(hash, [1n, 2n]);
      expect(() => group.addMembers([3n, 4n, 3n])).to.throw(DuplicateMemberError);
      expect(group.size).to.equal(2);
      expect(group.indexOf(3n)).to.be.undefined;
    });
  });

  describe('updateMember', () => {
    it('should replace a member and its index entry', () => {
      const group = new Group(hash, [1n, 2n, 3n]);
      group.updateMember(1, 7n);

      expect(group.members).to.deep.equal([1n, 7n, 3n]);
      expect(group.root).to.equal(1007003n);
      expect(group.indexOf(7n)).to.equal(1);
      expect(group.indexOf(2n)).to.be.undefined;
    });

    it('should leave the group untouched when the value is unchanged', () => {
      const group = new Group(hash, [1n, 2n, 3n]);
      group.updateMember(1, 2n);
      expect(group.root).to.equal(1002003n);
    });

    it('should reject a value held by another member', () => {
      const group = new Group(hash, [1n, 2n, 3n]);
      expect(() => group.updateMember(0, 3n)).to.throw(DuplicateMemberError);
    });

    it('should reject an index past the end', () => {
      const group = new Group(hash, [1n, 2n, 3n]);
      expect(() => group.updateMember(3, 9n)).to.throw(IndexOutOfRangeError);
    });

    it('should reject updating a removed slot', () => {
      const group = new Group(hash, [1n, 2n, 3n]);
      group.removeMember(1);
      expect(() => group.updateMember(1, 9n)).to.throw(RemovedMemberError);
    });
  });

  describe('removeMember', () => {
    it('should zero the leaf and keep other indices', () => {
      const group = new Group(hash, [1n, 2n, 3n]);
      group.removeMember(1);

      expect(group.members).to.deep.equal([1n, 0n, 3n]);
      expect(group.size).to.equal(3);
      expect(group.root).to.equal(1000003n);
      expect(group.indexOf(2n)).to.be.undefined;
      expect(group.indexOf(3n)).to.equal(2);
    });

    it('should reject removing a slot twice', () => {
      const group = new Group(hash, [1n, 2n, 3n]);
      group.removeMember(0);
      expect(() => group.removeMember(0)).to.throw(RemovedMemberError, /index 0 has been removed/);
    });

    it('should reject negative and fractional indices', () => {
      const group = new Group(hash, [1n, 2n]);
      expect(() => group.removeMember(-1)).to.throw(IndexOutOfRangeError);
      expect(() => group.removeMember(0.5)).to.throw(IndexOutOfRangeError);
      expect(() => group.updateMember(-1, 9n)).to.throw(IndexOutOfRangeError);
      expect(() => group.generateMerkleProof(-1)).to.throw(
        IndexOutOfRangeError,
        'index must be a non-negative integer',
      );
      expect(group.members).to.deep.equal([1n, 2n]);
    });

    it('should allow re-adding a removed value at a new index', () => {
      const group = new Group(hash, [1n, 2n, 3n]);
      group.removeMember(1);
      group.addMember(2n);
      expect(group.indexOf(2n)).to.equal(3);
    });
  });

  describe('indexOf', () => {
    it('should never find the zero sentinel', () => {
      const group = new Group(hash, [1n, 2n]);
      group.removeMember(0);
      expect(group.indexOf(0n)).to.be.undefined;
    });
  });

  describe('Merkle proofs', () => {
    it('should generate a lean proof for a member', () => {
      const group = new Group(hash, [1n, 2n, 3n]);
      const proof = group.generateMerkleProof(2);

      expect(proof.siblings).to.deep.equal([1002n]);
      expect(proof.pathIndices).to.deep.equal([1]);
      expect(group.verifyMerkleProof(proof, 3n)).to.be.true;
    });

    it('should reject an index past the end', () => {
      const group = new Group(hash, [1n, 2n, 3n]);
      expect(() => group.generateMerkleProof(5)).to.throw(IndexOutOfRangeError);
    });

    it('should refuse to prove a removed slot', () => {
      const group = new Group(hash, [1n, 2n, 3n]);
      group.removeMember(1);
      expect(() => group.generateMerkleProof(1)).to.throw(IndexOutOfRangeError, /removed member/);
    });

    it('should never verify the zero sentinel', () => {
      const group = new Group(hash, [1n, 2n, 3n]);
      const proof = group.generateMerkleProof(1);
      group.removeMember(1);
      const stale = { ...group.generateMerkleProof(0), leaf: 0n };

      expect(group.verifyMerkleProof(proof, 0n)).to.be.false;
      expect(group.verifyMerkleProof(stale, 0n)).to.be.false;
    });

    it('should reject a proof made before a mutation against the new root', () => {
      const group = new Group(hash, [1n, 2n, 3n]);
      const proof = group.generateMerkleProof(0);
      group.addMember(4n);
      expect(group.verifyMerkleProof({ ...proof, root: group.root ?? 0n }, 1n)).to.be.false;
    });
  });

  describe('export / import', () => {
    it('should export decimal leaves including removed slots', () => {
      const group = new Group(hash, [1n, 2n, 3n]);
      group.removeMember(1);
      expect(group.export()).to.equal('["1","0","3"]');
    });

    it('should import to the same root and index', () => {
      const group = new Group(hash, [1n, 2n, 3n, 4n, 5n]);
      group.removeMember(3);
      const restored = Group.import(group.export(), hash);

      expect(restored.root).to.equal(group.root);
      expect(restored.members).to.deep.equal(group.members);
      expect(restored.indexOf(5n)).to.equal(4);
      expect(restored.indexOf(4n)).to.be.undefined;
    });

    it('should reject malformed exports', () => {
      expect(() => Group.import('{', hash)).to.throw(SignetValidationError, /Invalid group export/);
      expect(() => Group.import('{"a":1}', hash)).to.throw(SignetValidationError, /JSON array/);
      expect(() => Group.import('[1]', hash)).to.throw(SignetValidationError);
      expect(() => Group.import('["01"]', hash)).to.throw(SignetValidationError);
    });

    it('should reject repeated members on import', () => {
      expect(() => Group.import('["5","0","5"]', hash)).to.throw(DuplicateMemberError);
    });
  });

  describe('Poseidon groups', () => {
    it('should give a 3-member group depth 2 and the lean root', async () => {
      const poseidon = await getPoseidon2();
      const group = await createGroup([101n, 202n, 303n]);

      expect(group.depth).to.equal(2);
      expect(group.root).to.equal(poseidon(poseidon(101n, 202n), 303n));
    });

    it('should go to depth 3 at 5 members', async () => {
      const group = await createGroup([101n, 202n, 303n, 404n]);
      expect(group.depth).to.equal(2);
      group.addMember(505n);
      expect(group.depth).to.equal(3);
    });

    it('should round-trip through importGroup', async () => {
      const group = await createGroup([101n, 202n, 303n]);
      const restored = await importGroup(group.export());
      expect(restored.root).to.equal(group.root);
    });
  });
});
