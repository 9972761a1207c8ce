import { normalizeError } from '@sonar-admin/utils';
import { z } from 'zod/v4';
import type { SonarQubeHttpClient } from '../clients/sonarqube-http.client';
import {
  GroupAlreadyExistsError,
  GroupNotFoundError,
  InsufficientPrivilegesError,
  SonarQubeApiError,
  TransportError,
  UnexpectedResponseError,
  UnexpectedStatusError,
} from '../core/errors';
import type { CallResult, JsonObject } from '../core/types';
import type { Group, GroupMutationResult } from './groups.types';
import type { SonarQubeGroupsFacade } from './sonarqube-groups.facade';

const SEARCH_ENDPOINT = '/api/user_groups/search';
const CREATE_ENDPOINT = '/api/user_groups/create';
const UPDATE_ENDPOINT = '/api/user_groups/update';
const DELETE_ENDPOINT = '/api/user_groups/delete';

// update and delete answer 204 No Content on current SonarQube versions
const MUTATION_STATUS_CODES = [200, 201, 204];

const ALREADY_EXISTS_PATTERN = /already exists/i;
const NOT_FOUND_PATTERN = /not found|does not exist|no group|could not find/i;

const searchResponseSchema = z.object({
  groups: z.array(
    z.object({
      // older servers return numeric ids
      id: z.union([z.string(), z.number()]).transform(String),
      name: z.string(),
      description: z.string().optional(),
    }),
  ),
});

export class GroupsService implements SonarQubeGroupsFacade {
  public constructor(private readonly httpClient: SonarQubeHttpClient) {}

  public async listGroups(): Promise<Group[]> {
    return this.search();
  }

  /**
   * Resolves a group id by exact name. The server-side `q` filter is a fuzzy match,
   * so every returned entry is compared by name. Returns `null` when no group has
   * exactly this name.
   */
  public async findGroupIdByName(name: string): Promise<string | null> {
    const groups = await this.search(name);
    return groups.find((group) => group.name === name)?.id ?? null;
  }

  /**
   * Creates the group unless one with the same name exists.
   *
   * @throws GroupAlreadyExistsError when the name is taken, including when another
   * client created it between the lookup and the create call
   */
  public async createGroup(name: string, description?: string): Promise<GroupMutationResult> {
    const existingId = await this.findGroupIdByName(name);
    if (existingId !== null) {
      throw new GroupAlreadyExistsError(`Group '${name}' already exists.`);
    }

    try {
      const response = await this.httpClient.post(
        CREATE_ENDPOINT,
        description === undefined ? { name } : { name, description },
        { expectedStatusCodes: MUTATION_STATUS_CODES },
      );
      return withChanged(response, true);
    } catch (error) {
      if (isConnectionError(error) && ALREADY_EXISTS_PATTERN.test(error.message)) {
        throw new GroupAlreadyExistsError(`Group '${name}' already exists.`, { cause: error });
      }
      throw classifyError(error, `Failed to create group '${name}'`);
    }
  }

  public async updateGroup(id: string, name: string): Promise<GroupMutationResult> {
    const currentId = await this.findGroupIdByName(name);
    if (currentId === id) {
      return { msg: 'Group already has the desired name', changed: false };
    }

    try {
      const response = await this.httpClient.post(
        UPDATE_ENDPOINT,
        { id, name },
        { expectedStatusCodes: MUTATION_STATUS_CODES },
      );
      return withChanged(response, true);
    } catch (error) {
      throw classifyError(error, `Failed to update group '${id}'`);
    }
  }

  /**
   * @throws GroupNotFoundError when no group has this name, including when it was
   * deleted between the lookup and the delete call
   */
  public async deleteGroup(name: string): Promise<GroupMutationResult> {
    const id = await this.findGroupIdByName(name);
    if (id === null) {
      throw new GroupNotFoundError(`Group with name '${name}' not found.`);
    }

    try {
      const response = await this.httpClient.post(
        DELETE_ENDPOINT,
        { id },
        { expectedStatusCodes: MUTATION_STATUS_CODES },
      );
      return withChanged(response, true);
    } catch (error) {
      if (isConnectionError(error) && NOT_FOUND_PATTERN.test(error.message)) {
        throw new GroupNotFoundError(`Group with name '${name}' not found.`, { cause: error });
      }
      throw classifyError(error, `Failed to delete group '${name}'`);
    }
  }

  private async search(query?: string): Promise<Group[]> {
    let response: CallResult;
    try {
      response = await this.httpClient.get(
        SEARCH_ENDPOINT,
        query === undefined ? undefined : { q: query },
      );
    } catch (error) {
      throw classifyError(error, 'Failed to search groups');
    }

    const parsed = searchResponseSchema.safeParse(response);
    if (!parsed.success) {
      throw new UnexpectedResponseError(
        `Unexpected response from ${SEARCH_ENDPOINT}: ${z.prettifyError(parsed.error)}`,
      );
    }

    return parsed.data.groups.map(({ id, name, description }) =>
      description === undefined ? { id, name } : { id, name, description },
    );
  }
}

function isConnectionError(error: unknown): error is TransportError | UnexpectedStatusError {
  return error instanceof TransportError || error instanceof UnexpectedStatusError;
}

/**
 * A 403 from the server becomes InsufficientPrivilegesError, group errors raised by an
 * earlier step pass through, everything else is an UnexpectedResponseError.
 */
function classifyError(error: unknown, context: string): SonarQubeApiError {
  if (error instanceof UnexpectedStatusError && error.statusCode === 403) {
    return new InsufficientPrivilegesError(
      'Insufficient privileges to perform this action. Please check the token permissions.',
      { cause: error },
    );
  }
  if (error instanceof SonarQubeApiError && !isConnectionError(error)) {
    return error;
  }
  return new UnexpectedResponseError(`${context}: ${normalizeError(error).message}`, {
    cause: error,
  });
}

function withChanged(response: CallResult, changed: boolean): GroupMutationResult {
  if (!isJsonObject(response)) {
    throw new UnexpectedResponseError(
      `Expected a JSON object in the response, got: ${JSON.stringify(response)}`,
    );
  }
  return { ...response, changed };
}

function isJsonObject(value: CallResult): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
