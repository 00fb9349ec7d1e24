export { DiaryService } from './DiaryService';
export { ImageService } from './ImageService';
export * from './image-rules';
export * from './list-options';
