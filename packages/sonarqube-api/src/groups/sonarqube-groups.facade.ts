import type { Group, GroupMutationResult } from './groups.types';

export interface SonarQubeGroupsFacade {
  listGroups(): Promise<Group[]>;
  findGroupIdByName(name: string): Promise<string | null>;
  createGroup(name: string, description?: string): Promise<GroupMutationResult>;
  updateGroup(id: string, name: string): Promise<GroupMutationResult>;
  deleteGroup(name: string): Promise<GroupMutationResult>;
}
