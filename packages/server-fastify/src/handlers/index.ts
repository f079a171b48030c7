export { createDeleteHandler } from './delete';
export { createGetHandler } from './get';
export { createModifyHandler } from './modify';
export { writeOptions } from './options';
export { createPostHandler } from './post';
