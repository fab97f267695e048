export * from './types';
export { licensedUsersQuery } from './users/licensed-users';
export { subscribedSkusQuery } from './licenses/subscribed-skus';
