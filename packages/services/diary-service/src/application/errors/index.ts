export { DiaryError, DiaryErrorCode, type DiaryErrorCodeType } from './errors';
