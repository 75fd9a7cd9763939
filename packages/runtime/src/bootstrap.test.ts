// Tests for the grant service bootstrap

import { describe, it, expect, vi, afterEach } from 'vitest';
import { createInMemoryRepositoryContext } from '@pet-access/repositories';
import { createGrantService } from './bootstrap.js';
import { createStaticPetOwnerLookup } from './access/pet-owners.js';
import { createCapturingLogger } from './logging.js';
import { ForbiddenError, PetNotFoundError } from './errors.js';
import type { RuntimeConfig } from './config.js';

const memoryConfig: RuntimeConfig = {
  store: { driver: 'memory' },
  logging: { level: 'error' },
};

describe('createGrantService', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should log to the console at the configured level by default', async () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {});
    const info = vi.spyOn(console, 'info').mockImplementation(() => {});
    const service = createGrantService(
      { store: { driver: 'memory' }, logging: { level: 'info' } },
      { petOwners: createStaticPetOwnerLookup({}) }
    );

    await service.invite({ petId: 'pet-1', ownerId: 'owner-1', granteeId: 'vet-1' });

    expect(debug).not.toHaveBeenCalled();
    expect(info).toHaveBeenCalledTimes(1);
    expect(info).toHaveBeenCalledWith(
      '[INFO] Grant invited',
      expect.objectContaining({ petId: 'pet-1', granteeId: 'vet-1' })
    );
  });

  it('should run the grant lifecycle against the configured store', async () => {
    const service = createGrantService(memoryConfig, {
      petOwners: createStaticPetOwnerLookup({ 'pet-1': 'owner-1' }),
      logger: createCapturingLogger(),
    });

    const { grant } = await service.invite({
      petId: 'pet-1',
      ownerId: 'owner-1',
      granteeId: 'vet-1',
      scopes: ['pet:read', 'events:create'],
    });
    await service.accept({ grantId: grant.id, granteeId: 'vet-1' });

    expect(await service.access.can('vet-1', 'pet-1', 'events:create')).toBe(true);
    expect(
      await service.authorize({
        callerId: 'vet-1',
        petOwnerId: 'owner-1',
        petId: 'pet-1',
        requiredScope: 'events:void',
      })
    ).toBe('deny');
    expect((await service.getActiveGrant('pet-1', 'vet-1')).id).toBe(grant.id);
    expect((await service.listSharedPets('vet-1')).map((g) => g.petId)).toEqual(['pet-1']);

    await service.revoke({ grantId: grant.id, ownerId: 'owner-1' });
    expect(await service.access.can('vet-1', 'pet-1', 'events:create')).toBe(false);

    await service.close();
  });

  it('should restrict owner listings to the owner', async () => {
    const service = createGrantService(memoryConfig, {
      petOwners: createStaticPetOwnerLookup({ 'pet-1': 'owner-1' }),
      logger: createCapturingLogger(),
    });
    await service.invite({ petId: 'pet-1', ownerId: 'owner-1', granteeId: 'vet-1' });

    expect(await service.listForPetOwner({ petId: 'pet-1', callerId: 'owner-1' })).toHaveLength(1);
    await expect(
      service.listForPetOwner({ petId: 'pet-1', callerId: 'vet-1' })
    ).rejects.toBeInstanceOf(ForbiddenError);
  });

  it('should use the injected store, logger and clock', async () => {
    const repos = createInMemoryRepositoryContext();
    const logger = createCapturingLogger();
    const service = createGrantService(memoryConfig, {
      petOwners: createStaticPetOwnerLookup({}),
      logger,
      repos,
      now: () => new Date('2024-03-01T09:30:00.000Z'),
    });

    const { grant } = await service.invite({
      petId: 'pet-1',
      ownerId: 'owner-1',
      granteeId: 'vet-1',
    });

    expect(service.repos).toBe(repos);
    expect(repos._data.grants.get(grant.id)?.createdAt).toBe('2024-03-01T09:30:00.000Z');
    expect(logger.entries.map((e) => e.message)).toEqual([
      'Grant service started',
      'Grant invited',
    ]);
    expect(await service.listByPet('pet-1')).toHaveLength(1);
    expect(await service.listByGrantee('vet-1')).toHaveLength(1);
  });

  it('should gate owner invitations on pet ownership', async () => {
    const service = createGrantService(memoryConfig, {
      petOwners: createStaticPetOwnerLookup({ 'pet-1': 'owner-1' }),
      logger: createCapturingLogger(),
    });

    const { grant } = await service.inviteForPetOwner({
      petId: 'pet-1',
      callerId: 'owner-1',
      granteeId: 'vet-1',
    });
    expect(grant.ownerId).toBe('owner-1');

    await expect(
      service.inviteForPetOwner({ petId: 'pet-1', callerId: 'vet-2', granteeId: 'vet-2' })
    ).rejects.toBeInstanceOf(ForbiddenError);
    await expect(
      service.inviteForPetOwner({ petId: 'pet-2', callerId: 'owner-1', granteeId: 'vet-1' })
    ).rejects.toBeInstanceOf(PetNotFoundError);
  });

  it('should filter a grantee listing by status', async () => {
    const service = createGrantService(memoryConfig, {
      petOwners: createStaticPetOwnerLookup({}),
      logger: createCapturingLogger(),
    });
    const { grant } = await service.invite({ petId: 'pet-1', ownerId: 'owner-1', granteeId: 'vet-1' });
    await service.invite({ petId: 'pet-2', ownerId: 'owner-1', granteeId: 'vet-1' });
    await service.accept({ grantId: grant.id, granteeId: 'vet-1' });

    const active = await service.listByGrantee('vet-1', { statuses: ['active'] });
    expect(active.map((g) => g.id)).toEqual([grant.id]);
  });
});
