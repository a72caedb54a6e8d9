import type { DirectoryUser } from '../../external/interfaces.js';

export interface ResearchUserFields {
  givenName: string;
  surname: string;
  username: string;
  emailAddress: string | null;
  phoneNumber: string | null;
  countryCode: string | null;
  accountEnabled?: boolean;
  userPrincipalName?: string | null;
}

/**
 * A person who may be registered with one or more SREs.
 * Two users are the same user when their usernames match.
 */
export class ResearchUser {
  readonly givenName: string;
  readonly surname: string;
  readonly username: string;
  readonly emailAddress: string | null;
  readonly phoneNumber: string | null;
  readonly countryCode: string | null;
  readonly accountEnabled: boolean;
  readonly userPrincipalName: string | null;

  constructor(fields: ResearchUserFields) {
    this.givenName = fields.givenName;
    this.surname = fields.surname;
    this.username = fields.username;
    this.emailAddress = fields.emailAddress;
    this.phoneNumber = fields.phoneNumber;
    this.countryCode = fields.countryCode;
    this.accountEnabled = fields.accountEnabled ?? true;
    this.userPrincipalName = fields.userPrincipalName ?? null;
  }

  static fromDirectoryUser(user: DirectoryUser): ResearchUser {
    return new ResearchUser({
      givenName: user.givenName,
      surname: user.surname,
      username: user.mailNickname,
      emailAddress: user.mail,
      phoneNumber: user.mobilePhone,
      countryCode: user.usageLocation,
      accountEnabled: user.accountEnabled,
      userPrincipalName: user.userPrincipalName,
    });
  }

  get displayName(): string {
    return `${this.givenName} ${this.surname}`;
  }

  equals(other: ResearchUser): boolean {
    return this.username === other.username;
  }
}
