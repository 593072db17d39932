export type User = {
  id: string;
  username: string;
  email: string;
};
