import { describe, expect, it } from 'vitest';
import { MemoryStore } from './db/memoryStore';
import { PermissionDeniedError } from './errors';
import { assertCanManageProjects, canSeeProject, visibilityFilter } from './permissions';
import { addUser } from './testSupport';

describe('role policy', () => {
  it('scopes employees to their memberships', async () => {
    const store = new MemoryStore();
    const master = await addUser(store, 'sm', 'scrum_master');
    const dev = await addUser(store, 'dev');
    const project = await store.createProject({
      name: 'Orbit',
      description: '',
      createdBy: master.id,
      isActive: true,
      memberIds: []
    });

    expect(visibilityFilter(master)).toEqual({});
    expect(visibilityFilter(dev)).toEqual({ memberId: dev.id });
    expect(await canSeeProject(store, master, project)).toBe(true);
    expect(await canSeeProject(store, dev, project)).toBe(false);

    await store.setProjectMembers(project.id, [dev.id]);
    expect(await canSeeProject(store, dev, project)).toBe(true);
  });

  it('lets only a scrum master manage projects', () => {
    expect(() => assertCanManageProjects({ role: 'scrum_master' })).not.toThrow();
    expect(() => assertCanManageProjects({ role: 'employee' })).toThrow(PermissionDeniedError);
  });
});
