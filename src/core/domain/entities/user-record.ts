/**
 * UserRecord Entity
 *
 * A registered user as the core sees it. Free of any infrastructure concern.
 */

import { ValidationError } from "../errors/index.js";

export interface UserRecordProps {
  id: number;
  name: string;
  email: string;
}

export class UserRecord {
  readonly id: number;
  readonly name: string;
  readonly email: string;

  private constructor(props: UserRecordProps) {
    this.id = props.id;
    this.name = props.name;
    this.email = props.email;
    Object.freeze(this);
  }

  /**
   * Name and email may be empty here; rejecting them is the registration
   * rule's job, not the constructor's.
   */
  static create(props: UserRecordProps): UserRecord {
    if (!Number.isInteger(props.id)) {
      throw new ValidationError(["id"], "id must be an integer");
    }
    return new UserRecord(props);
  }

  hasName(): boolean {
    return this.name.length > 0;
  }

  hasEmail(): boolean {
    return this.email.length > 0;
  }
}
