import axios, { AxiosInstance } from 'axios';
import https from 'https';
import { createLogger } from './utils/logger.js';
import { normalizeError } from './utils/error-handler.js';
import { MalformedResponseError } from './utils/errors.js';
import { isRecord } from './utils/type-guards.js';
import {
  COLLECTION_KEYS,
  CollectionEntrySchema,
  ComputerRecord,
  ComputerRecordSchema,
  DETAIL_KEYS,
  PatchTitleDetail,
  PatchTitleDetailSchema,
  ResourceType,
} from './types/jss-api.js';

const logger = createLogger('jss-client');

const DEFAULT_TIMEOUT_MS = 60000;

export interface JssClassicClientConfig {
  /** Server root, e.g. https://casper.example.com (no /JSSResource suffix) */
  baseUrl: string;
  username: string;
  password: string;
  timeoutMs?: number;
  // Set to false only for servers with self-signed certificates
  rejectUnauthorized?: boolean;
}

/**
 * Read-only client for the Classic API collection and detail endpoints.
 *
 * Every request carries Basic auth and `Accept: application/json`; without
 * the Accept header the Classic API answers in XML.
 */
export class JssClassicClient {
  private axiosInstance: AxiosInstance;
  private basicAuthHeader: string;
  private config: JssClassicClientConfig;

  constructor(config: JssClassicClientConfig) {
    if (!config.username || !config.password) {
      throw new Error('No authentication credentials provided. Need username and password for Basic Auth');
    }

    this.config = config;
    this.basicAuthHeader = `Basic ${Buffer.from(`${config.username}:${config.password}`).toString('base64')}`;

    this.axiosInstance = axios.create({
      baseURL: `${config.baseUrl.replace(/\/+$/, '')}/JSSResource`,
      headers: {
        Accept: 'application/json',
      },
      timeout: config.timeoutMs ?? DEFAULT_TIMEOUT_MS,
      httpsAgent: new https.Agent({
        keepAlive: true,
        rejectUnauthorized: config.rejectUnauthorized ?? true,
      }),
    });

    this.axiosInstance.interceptors.request.use((requestConfig) => {
      requestConfig.headers['Authorization'] = this.basicAuthHeader;

      // Classic reads are served from a server-side cache unless told otherwise
      if (String(requestConfig.method ?? 'get').toLowerCase() === 'get') {
        if (requestConfig.headers['Cache-Control'] === undefined) {
          requestConfig.headers['Cache-Control'] = 'no-cache';
        }
      }
      return requestConfig;
    });
  }

  get baseUrl(): string {
    return this.config.baseUrl;
  }

  /**
   * List the ids of a collection. Fails on a malformed collection instead of
   * returning an empty list.
   */
  async listIdentifiers(resource: ResourceType): Promise<number[]> {
    const path = `/${resource}`;
    logger.info({ resource }, `Listing ${resource}`);
    const data = await this.get(path, { resource });

    if (!isRecord(data)) {
      throw new MalformedResponseError(`Response from ${path} is not a JSON object`, { resource });
    }

    const key = COLLECTION_KEYS[resource].find((candidate) => candidate in data);
    const entries = key === undefined ? undefined : data[key];
    if (!Array.isArray(entries)) {
      throw new MalformedResponseError(
        `Response from ${path} has no ${COLLECTION_KEYS[resource].join(' or ')} list`,
        { resource, keys: Object.keys(data) }
      );
    }

    const ids: number[] = [];
    const seen = new Set<number>();
    entries.forEach((entry, index) => {
      const parsed = CollectionEntrySchema.safeParse(entry);
      if (!parsed.success) {
        throw new MalformedResponseError(`Entry ${index} of ${path} has no usable id`, { resource, index });
      }
      if (!seen.has(parsed.data.id)) {
        seen.add(parsed.data.id);
        ids.push(parsed.data.id);
      }
    });

    logger.info({ resource, count: ids.length }, `Found ${ids.length} ${resource}`);
    return ids;
  }

  async listComputerIds(): Promise<number[]> {
    return this.listIdentifiers('computers');
  }

  async listPatchIds(): Promise<number[]> {
    return this.listIdentifiers('patches');
  }

  /**
   * Fetch one detail record by id
   */
  async getDetail(resource: 'computers', id: number): Promise<ComputerRecord>;
  async getDetail(resource: 'patches', id: number): Promise<PatchTitleDetail>;
  async getDetail(resource: ResourceType, id: number): Promise<ComputerRecord | PatchTitleDetail>;
  async getDetail(resource: ResourceType, id: number): Promise<ComputerRecord | PatchTitleDetail> {
    return resource === 'computers' ? this.getComputerDetails(id) : this.getPatchDetails(id);
  }

  async getComputerDetails(id: number): Promise<ComputerRecord> {
    const body = await this.getDetailBody('computers', id);
    const parsed = ComputerRecordSchema.safeParse(body);
    if (!parsed.success) {
      throw new MalformedResponseError(`Computer ${id} detail is not an object`, { resource: 'computers', id });
    }
    return parsed.data;
  }

  async getPatchDetails(id: number): Promise<PatchTitleDetail> {
    const body = await this.getDetailBody('patches', id);
    const parsed = PatchTitleDetailSchema.safeParse(body);
    if (!parsed.success) {
      throw new MalformedResponseError(`Patch title ${id} detail has no name`, { resource: 'patches', id });
    }
    return parsed.data;
  }

  private async getDetailBody(resource: ResourceType, id: number): Promise<unknown> {
    const path = `/${resource}/id/${encodeURIComponent(String(id))}`;
    logger.debug({ resource, id }, `Getting ${resource} detail ${id}`);
    const data = await this.get(path, { resource, id });

    const key = DETAIL_KEYS[resource];
    if (!isRecord(data) || !isRecord(data[key])) {
      throw new MalformedResponseError(`Response from ${path} has no ${key} object`, { resource, id });
    }
    return data[key];
  }

  private async get(path: string, context: Record<string, unknown>): Promise<unknown> {
    try {
      const response = await this.axiosInstance.get<unknown>(path);
      return response.data;
    } catch (error) {
      throw normalizeError(error, context);
    }
  }
}
