// Worksheet / Pipeline Types

export type Flow = 'download' | 'upload';

// As read from the worksheet when the run starts; workers only return results
export type ItemStatus = '' | 'done' | 'failed';

export interface WorkItem {
  id: string;
  desiredName: string; // Normalized, always carries an extension
  destinationRef: string;
  status: ItemStatus;
  localPath: string;
}

export interface AccountCredential {
  readonly name: string;
  readonly accountId: string;
  readonly clientId: string;
  readonly clientSecret: string;
}

export type AccessToken = string;

export type OwnerScope =
  | { kind: 'none' }
  | { kind: 'user'; id: string }
  | { kind: 'team'; id: string };

// Folders are "projects" in the API; albums (showcases) take videos the same way
export type ContainerKind = 'project' | 'album';

export interface DestinationDescriptor {
  containerId: string;
  containerKind: ContainerKind;
  ownerScope: OwnerScope;
}

export type RunOutcome = 'downloaded' | 'uploaded' | 'partial' | 'skipped' | 'failed';

export interface RunResult {
  id: string;
  outcome: RunOutcome;
  message: string;
  resolvedRef?: string | undefined;
  accountUsed?: string | undefined;
}

// Boundary results: these never throw, callers branch on the discriminant
export type TokenResult =
  | { success: true; token: AccessToken }
  | { success: false; error: string };

export type LookupFailureReason = 'unauthorized' | 'not_found' | 'http_error' | 'network_error' | 'invalid_response';

export type LookupResult<T> =
  | { success: true; value: T }
  | { success: false; reason: LookupFailureReason; error: string };

export interface AssetRef {
  url: string;
  accountUsed: string;
  token: AccessToken;
}

export type LocateResult =
  | ({ found: true } & AssetRef)
  | { found: false; attempts: number };

export type TransferResult =
  | { success: true; bytes: number }
  | { success: false; error: string };

export interface UploadedRef {
  uri: string;
  videoId: string;
}

export type UploadResult =
  | ({ success: true } & UploadedRef)
  | { success: false; error: string };

export type AssignResult =
  | { success: true }
  | { success: false; error: string; status?: number | undefined };

export type ItemPlan = 'skip' | 'process' | 'missing-file';
