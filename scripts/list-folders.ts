#!/usr/bin/env tsx

import { Command } from 'commander';
import chalk from 'chalk';
import { VimeoClient } from '../src/api/vimeo-client';
import { VimeoNamedResource } from '../src/types/api-types';
import { bootstrap } from '../src/core/flow-runner';
import { resolve, trailingNumericId } from '../src/core/uri-resolver';
import { PreconditionError, errorMessage } from '../src/utils/errors';
import { getLogger } from '../src/utils/logger';
import { exitWithError } from './cli-helpers';

export type FolderKind = 'team-folder' | 'personal-folder' | 'album';

export interface FolderEntry {
  kind: FolderKind;
  name: string;
  uri: string;
  owner: string;
  worksheetRef: string; // Value to paste into the "Vimeo URI" column
}

export interface FolderListing {
  user: string;
  scope: string;
  teams: Array<{ id: string; name: string }>;
  folders: FolderEntry[];
}

export type FolderSource = Pick<
  VimeoClient,
  'verifyToken' | 'getCurrentUser' | 'listTeams' | 'listTeamFolders' | 'listPersonalFolders' | 'listAlbums'
>;

/**
 * Worksheet reference for a folder: its own URI when it already resolves,
 * otherwise one built from the folder id and the listing it came from.
 */
export function worksheetRefFor(resource: VimeoNamedResource, fallbackPrefix: string): string {
  if (resolve(resource.uri)) {
    return resource.uri;
  }
  const id = trailingNumericId(resource.uri);
  return id ? `${fallbackPrefix}/${id}` : resource.uri;
}

export class FolderDirectory {
  private client: FolderSource;

  constructor(client: FolderSource) {
    this.client = client;
  }

  /**
   * Verify the token and collect every folder it can reach. A team whose
   * folders cannot be listed is reported and skipped.
   */
  async collect(token: string): Promise<FolderListing> {
    const logger = getLogger();

    let scope: string;
    try {
      const info = await this.client.verifyToken(token);
      scope = info.scope ?? '';
    } catch (error) {
      throw new PreconditionError(`Vimeo access token was rejected: ${errorMessage(error)}`);
    }

    const user = await this.client.getCurrentUser(token);
    const folders: FolderEntry[] = [];
    const teams: FolderListing['teams'] = [];

    for (const team of await this.client.listTeams(token)) {
      const teamId = trailingNumericId(team.uri);
      if (!teamId) {
        logger.warning(`Skipping team with unrecognised URI '${team.uri}'`);
        continue;
      }
      const teamName = team.name ?? `Team ${teamId}`;
      teams.push({ id: teamId, name: teamName });

      try {
        for (const folder of await this.client.listTeamFolders(teamId, token)) {
          folders.push({
            kind: 'team-folder',
            name: folder.name ?? '(unnamed)',
            uri: folder.uri,
            owner: teamName,
            worksheetRef: worksheetRefFor(folder, `/teams/${teamId}/projects`)
          });
        }
      } catch (error) {
        logger.warning(`Could not list folders for team '${teamName}' (${teamId}): ${errorMessage(error)}`);
      }
    }

    const userName = user.name ?? user.uri;
    for (const folder of await this.client.listPersonalFolders(token)) {
      folders.push({
        kind: 'personal-folder',
        name: folder.name ?? '(unnamed)',
        uri: folder.uri,
        owner: userName,
        worksheetRef: worksheetRefFor(folder, '/me/projects')
      });
    }
    for (const album of await this.client.listAlbums(token)) {
      folders.push({
        kind: 'album',
        name: album.name ?? '(unnamed)',
        uri: album.uri,
        owner: userName,
        worksheetRef: worksheetRefFor(album, '/me/albums')
      });
    }

    return { user: userName, scope, teams, folders };
  }
}

function printListing(listing: FolderListing): void {
  console.log(chalk.bold(`Vimeo user: ${listing.user}`));
  console.log(`Token scopes: ${listing.scope || '(none reported)'}`);
  console.log(`Teams: ${listing.teams.length === 0 ? '(none)' : listing.teams.map(team => `${team.name} (${team.id})`).join(', ')}`);
  console.log('');

  const sections: Array<{ kind: FolderKind; title: string }> = [
    { kind: 'team-folder', title: 'Team folders' },
    { kind: 'personal-folder', title: 'Personal folders' },
    { kind: 'album', title: 'Albums' }
  ];
  for (const section of sections) {
    const entries = listing.folders.filter(folder => folder.kind === section.kind);
    console.log(chalk.bold(`${section.title} (${entries.length})`));
    for (const entry of entries) {
      console.log(`  ${entry.name} [${entry.owner}]`);
      console.log(`    ${chalk.cyan(entry.worksheetRef)}`);
    }
    console.log('');
  }
  console.log('Paste a value shown in cyan into the "Vimeo URI" column of the worksheet.');
}

async function main(): Promise<void> {
  const program = new Command();

  program
    .name('list-folders')
    .description('Check the Vimeo token and list the folders videos can be filed into')
    .option('--json', 'Print the listing as JSON')
    .option('--verbose', 'Enable verbose logging')
    .parse();

  const options = program.opts<{ json?: boolean; verbose?: boolean }>();

  try {
    const config = await bootstrap({ verbose: options.verbose });
    const token = config.vimeo.accessToken;
    if (!token) {
      throw new PreconditionError('Vimeo access token not found. Please set VIMEO_ACCESS_TOKEN.');
    }

    const client = new VimeoClient(undefined, {
      apiBaseUrl: config.vimeo.apiBaseUrl,
      timeoutMs: config.http.timeoutMs
    });
    const listing = await new FolderDirectory(client).collect(token);

    if (options.json) {
      console.log(JSON.stringify(listing, null, 2));
    } else {
      printListing(listing);
    }
    await getLogger().flush();
  } catch (error) {
    await exitWithError('Folder listing failed', error);
  }
}

if (require.main === module) {
  main().catch(error => exitWithError('Unhandled error', error));
}
