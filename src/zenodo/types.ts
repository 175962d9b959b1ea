import type { RequestInit, Response } from 'node-fetch';

export interface CommunitySearchOptions {
  communityId: string;
  pageSize: number;
  maxRecords?: number;
  pageDelay?: number; // ms between page requests
}

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;
