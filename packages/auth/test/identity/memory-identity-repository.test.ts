/**
 * Tests for MemoryIdentityRepository
 */

import { IdentityConflictError, MemoryIdentityRepository, toPublicIdentity } from '../../src/index.js';

describe('MemoryIdentityRepository', () => {
  let repository: MemoryIdentityRepository;

  beforeEach(() => {
    repository = new MemoryIdentityRepository();
  });

  it('assigns ids and timestamps on create', async () => {
    const created = await repository.create({
      name: 'Ada',
      email: 'ada@example.com',
      role: 'user',
      externalIds: { github: '1' }
    });

    expect(created.id).toMatch(/^[0-9a-f-]{36}$/);
    expect(created.createdAt).toBeInstanceOf(Date);
    expect(created.updatedAt).toEqual(created.createdAt);
    expect(await repository.getById(created.id)).toEqual(created);
  });

  it('looks up emails case-insensitively', async () => {
    const created = await repository.create({ name: 'Ada', email: 'Ada@Example.com', role: 'user', externalIds: {} });

    expect((await repository.getByEmail('ada@example.com'))?.id).toBe(created.id);
  });

  it('looks up identities by provider account', async () => {
    const created = await repository.create({
      name: 'Ada',
      email: 'ada@example.com',
      role: 'user',
      externalIds: { github: '1', google: 'g-1' }
    });

    expect((await repository.getByExternalId('google', 'g-1'))?.id).toBe(created.id);
    expect(await repository.getByExternalId('google', '1')).toBeNull();
    expect(await repository.getByExternalId('github', 'g-1')).toBeNull();
  });

  it('rejects duplicate emails', async () => {
    await repository.create({ name: 'Ada', email: 'ada@example.com', role: 'user', externalIds: {} });

    await expect(repository.create({ name: 'Other', email: 'ADA@example.com', role: 'user', externalIds: {} }))
      .rejects.toBeInstanceOf(IdentityConflictError);
  });

  it('rejects a provider account that is already linked', async () => {
    await repository.create({ name: 'Ada', email: 'ada@example.com', role: 'user', externalIds: { github: '1' } });

    await expect(repository.create({ name: 'Other', email: 'other@example.com', role: 'user', externalIds: { github: '1' } }))
      .rejects.toThrow('github account already linked');
  });

  it('applies changes on update', async () => {
    const created = await repository.create({ name: 'Ada', email: 'ada@example.com', role: 'user', externalIds: {} });
    const lastLoginAt = new Date('2026-03-01T12:00:00.000Z');

    const updated = await repository.update(created.id, { lastLoginAt, role: 'admin' });

    expect(updated).toMatchObject({ id: created.id, lastLoginAt, role: 'admin', name: 'Ada' });
    expect(await repository.getById(created.id)).toEqual(updated);
  });

  it('throws when updating a missing identity', async () => {
    await expect(repository.update('missing', { name: 'Nobody' })).rejects.toThrow('Identity missing not found');
  });

  it('hands out copies', async () => {
    const created = await repository.create({ name: 'Ada', email: 'ada@example.com', role: 'user', externalIds: {} });

    created.name = 'Changed';

    expect((await repository.getById(created.id))?.name).toBe('Ada');
  });

  it('strips the password hash from public views', async () => {
    const created = await repository.create({
      name: 'Ada',
      email: 'ada@example.com',
      role: 'user',
      externalIds: {},
      passwordHash: 'test-hash'
    });

    const publicView = toPublicIdentity(created);

    expect(publicView).not.toHaveProperty('passwordHash');
    expect(publicView.email).toBe('ada@example.com');
  });
});
