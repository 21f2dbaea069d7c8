export * from './api/user';
export * from './api/article';
export * from './api/comment';
export * from './api/params';
