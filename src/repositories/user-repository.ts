export interface UserData {
  id: number;
  email: string;
}

export interface CreateUserInput {
  email: string;
}

export interface UserRepository {
  createUser(input: CreateUserInput): Promise<UserData>;
  getUserById(id: number): Promise<UserData | null>;
}
