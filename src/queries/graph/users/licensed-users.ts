import { GraphQueryDefinition } from '../types';

export const licensedUsersQuery: GraphQueryDefinition = {
  id: 'licensed_users_sign_in',
  query: {
    endpoint: '/users',
    select: [
      'id',
      'displayName',
      'userPrincipalName',
      'assignedLicenses',
      'signInActivity'
    ],
    top: 999
  }
};
