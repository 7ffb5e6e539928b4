import User, { toUserRecord, UserRecord } from '@src/models/User';


/******************************************************************************
                                 Types
******************************************************************************/

export interface NewUser {
  email: string;
  username: string;
  hashed_password: string;
}

export interface UserRepo {
  findById(id: string): Promise<UserRecord | null>;
  findByEmail(email: string): Promise<UserRecord | null>;
  findByUsername(username: string): Promise<UserRecord | null>;
  /** Match on username or email, whichever the login form supplied. */
  findByLogin(identifier: string): Promise<UserRecord | null>;
  create(input: NewUser): Promise<UserRecord>;
}


/******************************************************************************
                              Mongo implementation
******************************************************************************/

export class MongoUserRepo implements UserRepo {
  public async findById(id: string): Promise<UserRecord | null> {
    const doc = await User.findById(id);
    return doc ? toUserRecord(doc) : null;
  }

  public async findByEmail(email: string): Promise<UserRecord | null> {
    const doc = await User.findOne({ email: email.toLowerCase() });
    return doc ? toUserRecord(doc) : null;
  }

  public async findByUsername(username: string): Promise<UserRecord | null> {
    const doc = await User.findOne({ username });
    return doc ? toUserRecord(doc) : null;
  }

  public async findByLogin(identifier: string): Promise<UserRecord | null> {
    const doc = await User.findOne({
      $or: [{ username: identifier }, { email: identifier.toLowerCase() }],
    });
    return doc ? toUserRecord(doc) : null;
  }

  public async create(input: NewUser): Promise<UserRecord> {
    const doc = await User.create({
      email: input.email,
      username: input.username,
      hashedPassword: input.hashed_password,
    });
    return toUserRecord(doc);
  }
}
