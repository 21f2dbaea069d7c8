/** Gate rejections never reveal which rule failed. */
export const FORBIDDEN_MESSAGE = 'You are not allowed to do that';
