export { RawBodyInterceptor } from './raw-body.interceptor';
export { RequestLoggingInterceptor } from './request-logging.interceptor';
