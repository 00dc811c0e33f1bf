import { type AxiosInstance, isAxiosError } from 'axios';
import type pino from 'pino';

/**
 * Log JSON-RPC payloads at debug level and failed requests at error level
 */
export function addLoggerInterceptor(request: AxiosInstance, logger: pino.BaseLogger) {
  request.interceptors.request.use((config) => {
    logger.debug(`[${config.baseURL}] request ${JSON.stringify(config.data)}`);
    return config;
  });

  request.interceptors.response.use(
    (response) => {
      logger.debug(`[${response.config.baseURL}] ${response.status} ${JSON.stringify(response.data)}`);
      return response;
    },
    (error: unknown) => {
      if (isAxiosError(error)) {
        logger.error(`[${error.config?.baseURL}] ${error.response?.status ?? error.code}: ${error.message}`);
      }
      return Promise.reject(error);
    },
  );
}
