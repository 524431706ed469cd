import type { SeedPerson } from '@roster/types';

/**
 * Sample data inserted by `roster seed`.
 */
export const SAMPLE_PERSON: SeedPerson = {
  firstName: 'Matt',
  lastName: 'Groff',
  email: 'matt@umbrage.com',
  jobTitle: 'Director of Engineering',
  avatar: 'https://www.gravatar.com/avatar/b21bbd4c0b7f75a0fbb469c238639eb7',
  comments: [
    'This is a comment from Matt Groff',
    'This is another comment from Matt Groff',
  ],
};
