import type { ProjectPatch, Store } from '../db/store';
import { NotFoundError, ValidationError } from '../errors';
import { assertCanManageProjects, canSeeProject, visibilityFilter } from '../permissions';
import { serializeLabel, serializeProject, type LabelJson, type ProjectJson } from '../serializers';
import type { Project, User } from '../types';

export interface ProjectInput {
  name: string;
  description: string;
  memberIds: string[];
  isActive: boolean;
}

export type ProjectUpdate = ProjectPatch & { memberIds?: string[] };

export interface LabelInput {
  name: string;
  color: string;
}

export const DEFAULT_LABEL_COLOR = '#007bff';

export class ProjectService {
  constructor(private readonly store: Store) {}

  async list(user: User): Promise<ProjectJson[]> {
    const projects = await this.store.listProjects(visibilityFilter(user));
    return Promise.all(projects.map(p => this.present(p)));
  }

  async get(user: User, id: string): Promise<ProjectJson> {
    return this.present(await this.findVisible(user, id));
  }

  async create(user: User, input: ProjectInput): Promise<ProjectJson> {
    assertCanManageProjects(user);
    await this.assertUsersExist(input.memberIds);
    const project = await this.store.transaction(tx =>
      tx.createProject({
        name: input.name,
        description: input.description,
        createdBy: user.id,
        isActive: input.isActive,
        memberIds: input.memberIds
      })
    );
    return this.present(project);
  }

  async update(user: User, id: string, patch: ProjectUpdate): Promise<ProjectJson> {
    await this.findVisible(user, id);
    assertCanManageProjects(user);
    const { memberIds, ...fields } = patch;
    if (memberIds) await this.assertUsersExist(memberIds);

    const updated = await this.store.transaction(async tx => {
      const project = await tx.updateProject(id, fields);
      if (memberIds) await tx.setProjectMembers(id, memberIds);
      return project;
    });
    if (!updated) throw new NotFoundError('Project');
    return this.present(updated);
  }

  async remove(user: User, id: string): Promise<void> {
    await this.findVisible(user, id);
    assertCanManageProjects(user);
    await this.store.deleteProject(id);
  }

  async listLabels(user: User, projectId: string): Promise<LabelJson[]> {
    await this.findVisible(user, projectId);
    const labels = await this.store.listLabels(projectId);
    return labels.map(serializeLabel);
  }

  async createLabel(user: User, projectId: string, input: LabelInput): Promise<LabelJson> {
    await this.findVisible(user, projectId);
    assertCanManageProjects(user);
    const label = await this.store.createLabel({ projectId, name: input.name, color: input.color });
    return serializeLabel(label);
  }

  /** Project visible to `user`; anything outside their scope reads as missing. */
  async findVisible(user: User, id: string): Promise<Project> {
    const project = await this.store.findProject(id);
    if (!project || !(await canSeeProject(this.store, user, project))) {
      throw new NotFoundError('Project');
    }
    return project;
  }

  private async present(project: Project): Promise<ProjectJson> {
    const [members, labels, taskCount] = await Promise.all([
      this.store.listProjectMembers(project.id),
      this.store.listLabels(project.id),
      this.store.countProjectTasks(project.id)
    ]);
    return serializeProject(project, members, labels, taskCount);
  }

  private async assertUsersExist(ids: string[]): Promise<void> {
    const unique = [...new Set(ids)];
    const found = await this.store.findUsersByIds(unique);
    const missing = unique.filter(id => !found.some(u => u.id === id));
    if (missing.length) {
      throw new ValidationError('Invalid input', {
        member_ids: missing.map(id => `Invalid pk "${id}" - object does not exist.`)
      });
    }
  }
}
