// ---------------------------------------------------------------------------
// Repository identity: everything the Identify verb reports.
// ---------------------------------------------------------------------------

import type { Granularity } from "../value-objects/granularity.js";
import type { UTCdatetime } from "../value-objects/utc-datetime.js";
import type { BaseURL } from "./base-url.js";
import type { DeletedRecord } from "./deleted-record.js";
import { DescriptionCollection } from "./description.js";
import type { EmailCollection } from "./email-collection.js";
import type { ProtocolVersion } from "./protocol-version.js";
import type { RepositoryName } from "./repository-name.js";

export interface RepositoryIdentityProps {
  repositoryName: RepositoryName;
  baseURL: BaseURL;
  protocolVersion: ProtocolVersion;
  adminEmails: EmailCollection;
  earliestDatestamp: UTCdatetime;
  deletedRecord: DeletedRecord;
  granularity: Granularity;
  /** Optional `<description>` containers; none when omitted. */
  descriptions?: DescriptionCollection;
}

/**
 * Immutable description of the repository. Value-equal across all fields.
 */
export class RepositoryIdentity {
  public readonly repositoryName: RepositoryName;
  public readonly baseURL: BaseURL;
  public readonly protocolVersion: ProtocolVersion;
  public readonly adminEmails: EmailCollection;
  public readonly earliestDatestamp: UTCdatetime;
  public readonly deletedRecord: DeletedRecord;
  public readonly granularity: Granularity;
  public readonly descriptions: DescriptionCollection;

  constructor(props: RepositoryIdentityProps) {
    this.repositoryName = props.repositoryName;
    this.baseURL = props.baseURL;
    this.protocolVersion = props.protocolVersion;
    this.adminEmails = props.adminEmails;
    this.earliestDatestamp = props.earliestDatestamp;
    this.deletedRecord = props.deletedRecord;
    this.granularity = props.granularity;
    this.descriptions = props.descriptions ?? new DescriptionCollection();
  }

  /** Same identity with a different base URL (deployment override). */
  withBaseURL(baseURL: BaseURL): RepositoryIdentity {
    return new RepositoryIdentity({ ...this.toProps(), baseURL });
  }

  equals(other: RepositoryIdentity): boolean {
    return (
      this.repositoryName.equals(other.repositoryName) &&
      this.baseURL.equals(other.baseURL) &&
      this.protocolVersion.equals(other.protocolVersion) &&
      this.adminEmails.equals(other.adminEmails) &&
      this.earliestDatestamp.equals(other.earliestDatestamp) &&
      this.deletedRecord === other.deletedRecord &&
      this.granularity === other.granularity &&
      this.descriptions.equals(other.descriptions)
    );
  }

  private toProps(): RepositoryIdentityProps {
    return {
      repositoryName: this.repositoryName,
      baseURL: this.baseURL,
      protocolVersion: this.protocolVersion,
      adminEmails: this.adminEmails,
      earliestDatestamp: this.earliestDatestamp,
      deletedRecord: this.deletedRecord,
      granularity: this.granularity,
      descriptions: this.descriptions,
    };
  }
}
