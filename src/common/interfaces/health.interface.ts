import { StorageDriver } from '../../config/pool.config';

export interface HealthResponse {
  status: 'ok' | 'error';
  timestamp: string;
  uptime: number;
  service: string;
  storage: StorageDriver;
  members: number;                 // size of the member registry
}
