/**
 * GeoLayer CLI
 *
 * Thin command-line front end over {@link GeoLayerClient}. Each command
 * prints the decoded result as JSON; failures print a JSON error object to
 * stderr and map to an exit code by error kind.
 *
 * Usage:
 *   geolayer [--base-url <url>] [--deferred] [--verbose] <command> [args]
 *
 * @module cli
 */

import { Command, CommanderError } from 'commander';
import { GeoLayerClient, type GeoLayerClientOptions } from '../client.js';
import { CLIENT_VERSION } from '../core/config.js';
import { InvalidRequestError, isGeoLayerError, type ErrorKind } from '../core/errors.js';
import { Logger } from '../core/utils/logger.js';
import { settle, type Dispatch } from '../dispatch/dispatcher.js';
import { Envelope } from '../model/envelope.js';
import { historyQuery, nearbyByGeohash, nearbyByLatLon, type NearbyQuery } from '../query/query.js';

// ============================================================================
// Exit Codes
// ============================================================================

export const EXIT_CODES = {
  SUCCESS: 0,
  SERVICE_ERROR: 1,
  USAGE_ERROR: 2,
  NOT_AUTHORIZED: 3,
  NETWORK_ERROR: 4,
  NO_SUCH_RECORD: 5,
  MALFORMED_RESPONSE: 6,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

const EXIT_CODE_BY_KIND: Record<ErrorKind, ExitCode> = {
  not_authorized: EXIT_CODES.NOT_AUTHORIZED,
  no_such_record: EXIT_CODES.NO_SUCH_RECORD,
  unsupported_operation: EXIT_CODES.USAGE_ERROR,
  malformed_response: EXIT_CODES.MALFORMED_RESPONSE,
  transport: EXIT_CODES.NETWORK_ERROR,
  service: EXIT_CODES.SERVICE_ERROR,
  invalid_request: EXIT_CODES.USAGE_ERROR,
};

export function exitCodeFor(error: unknown): ExitCode {
  if (isGeoLayerError(error)) {
    return EXIT_CODE_BY_KIND[error.kind];
  }
  if (error instanceof CommanderError) {
    return error.exitCode === 0 ? EXIT_CODES.SUCCESS : EXIT_CODES.USAGE_ERROR;
  }
  return EXIT_CODES.SERVICE_ERROR;
}

// ============================================================================
// Dependencies
// ============================================================================

export interface CliIO {
  readonly out: (text: string) => void;
  readonly err: (text: string) => void;
}

export interface CliDeps {
  readonly io: CliIO;
  readonly createClient: (options: GeoLayerClientOptions) => GeoLayerClient;
}

export const defaultDeps: CliDeps = {
  io: {
    out: (text) => process.stdout.write(text),
    err: (text) => process.stderr.write(text),
  },
  createClient: (options) => new GeoLayerClient(options),
};

type GlobalOptions = {
  readonly baseUrl?: string;
  readonly deferred?: boolean;
  readonly verbose?: boolean;
};

type NearbyCliOptions = {
  readonly geohash?: string;
  readonly lat?: string;
  readonly lon?: string;
  readonly radius?: string;
  readonly limit?: string;
  readonly cursor?: string;
  readonly types?: string;
};

type PageCliOptions = {
  readonly limit?: string;
  readonly cursor?: string;
};

// ============================================================================
// Argument parsing
// ============================================================================

function toNumber(value: string, name: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    throw new InvalidRequestError(`${name} must be a number, got "${value}"`);
  }
  return parsed;
}

function toOptionalNumber(value: string | undefined, name: string): number | undefined {
  return value === undefined ? undefined : toNumber(value, name);
}

function toNearbyQuery(layer: string, options: NearbyCliOptions): NearbyQuery {
  const common = {
    limit: toOptionalNumber(options.limit, 'limit'),
    cursor: options.cursor,
    types: options.types
      ?.split(',')
      .map((type) => type.trim())
      .filter((type) => type.length > 0),
  };

  if (options.geohash !== undefined) {
    return nearbyByGeohash(options.geohash, layer, common);
  }

  if (options.lat !== undefined && options.lon !== undefined) {
    return nearbyByLatLon(
      toNumber(options.lat, 'lat'),
      toNumber(options.lon, 'lon'),
      toOptionalNumber(options.radius, 'radius'),
      layer,
      common
    );
  }

  throw new InvalidRequestError('nearby needs --geohash or both --lat and --lon');
}

// ============================================================================
// Program
// ============================================================================

export function createProgram(deps: CliDeps = defaultDeps): Command {
  const program = new Command();
  const { io } = deps;

  program
    .name('geolayer')
    .description('Query and manage records on a GeoLayer service')
    .version(CLIENT_VERSION, '-V, --version', 'Output the version number')
    .option('--base-url <url>', 'Service root (default: GEOLAYER_API_URL or the public endpoint)')
    .option('--deferred', 'Run calls on the worker pool and wait for the handle')
    .option('-v, --verbose', 'Log every request')
    .exitOverride()
    .configureOutput({ writeOut: io.out, writeErr: io.err });

  const client = (): GeoLayerClient => {
    const options = program.opts<GlobalOptions>();
    return deps.createClient({
      baseUrl: options.baseUrl,
      mode: options.deferred ? 'deferred' : undefined,
      logger: new Logger({
        level: options.verbose ? 'debug' : 'error',
        service: 'geolayer-cli',
        pretty: true,
      }),
    });
  };

  const print = async <T>(dispatch: Promise<Dispatch<T>>): Promise<void> => {
    const result = await settle(await dispatch);
    io.out(`${JSON.stringify(result, null, 2)}\n`);
  };

  // ==========================================================================
  // Records
  // ==========================================================================

  program
    .command('retrieve')
    .description('Fetch records of a layer by id')
    .argument('<layer>', 'Layer name')
    .argument('<ids...>', 'Record ids')
    .action(async (layer: string, ids: string[]) => {
      await print(client().retrieveByIds(layer, ids));
    });

  program
    .command('delete')
    .description('Delete one record')
    .argument('<layer>', 'Layer name')
    .argument('<id>', 'Record id')
    .action(async (layer: string, id: string) => {
      await print(client().deleteById(layer, id));
    });

  const history = program
    .command('history')
    .description('Where a record has been, most recent first')
    .argument('<layer>', 'Layer name')
    .argument('<id>', 'Record id')
    .option('--limit <n>', 'Page size')
    .option('--cursor <cursor>', 'Continue from a previous page');

  history.action(async (layer: string, id: string) => {
    const options = history.opts<PageCliOptions>();
    const query = historyQuery(id, layer, {
      limit: toOptionalNumber(options.limit, 'limit'),
      cursor: options.cursor,
    });
    await print(client().history(query));
  });

  // ==========================================================================
  // Search
  // ==========================================================================

  const nearby = program
    .command('nearby')
    .description('Records near a geohash or a point')
    .argument('<layer>', 'Layer name')
    .option('--geohash <hash>', 'Search inside a geohash')
    .option('--lat <lat>', 'Latitude of the search point')
    .option('--lon <lon>', 'Longitude of the search point')
    .option('--radius <km>', 'Search radius in kilometres')
    .option('--limit <n>', 'Page size')
    .option('--cursor <cursor>', 'Continue from a previous page')
    .option('--types <types>', 'Comma-separated record types');

  nearby.action(async (layer: string) => {
    await print(client().nearby(toNearbyQuery(layer, nearby.opts<NearbyCliOptions>())));
  });

  program
    .command('reverse-geocode')
    .description('Nearest street address to a point')
    .argument('<lat>', 'Latitude')
    .argument('<lon>', 'Longitude')
    .action(async (lat: string, lon: string) => {
      await print(client().reverseGeocode(toNumber(lat, 'lat'), toNumber(lon, 'lon')));
    });

  const density = program
    .command('density')
    .description('Population density around a point')
    .argument('<day>', 'Day of week, 0 (Sunday) to 6 (Saturday)')
    .argument('<lat>', 'Latitude')
    .argument('<lon>', 'Longitude')
    .option('--hour <hour>', 'Hour of day, 0 to 23 (default: whole day)');

  density.action(async (day: string, lat: string, lon: string) => {
    const { hour } = density.opts<{ readonly hour?: string }>();
    await print(
      client().density(
        toNumber(day, 'day'),
        hour === undefined ? -1 : toNumber(hour, 'hour'),
        toNumber(lat, 'lat'),
        toNumber(lon, 'lon')
      )
    );
  });

  program
    .command('contains')
    .description('Boundaries containing a point')
    .argument('<lat>', 'Latitude')
    .argument('<lon>', 'Longitude')
    .action(async (lat: string, lon: string) => {
      await print(client().contains(toNumber(lat, 'lat'), toNumber(lon, 'lon')));
    });

  program
    .command('boundary')
    .description('Shape of one boundary feature')
    .argument('<featureId>', 'Feature id')
    .action(async (featureId: string) => {
      await print(client().boundaries(featureId));
    });

  const overlaps = program
    .command('overlaps')
    .description('Boundaries intersecting a bounding box')
    .argument('<south>', 'Southern latitude')
    .argument('<west>', 'Western longitude')
    .argument('<north>', 'Northern latitude')
    .argument('<east>', 'Eastern longitude')
    .option('--limit <n>', 'Maximum results')
    .option('--type <type>', 'Feature type filter');

  overlaps.action(async (south: string, west: string, north: string, east: string) => {
    const options = overlaps.opts<{ readonly limit?: string; readonly type?: string }>();
    const envelope = new Envelope({
      south: toNumber(south, 'south'),
      west: toNumber(west, 'west'),
      north: toNumber(north, 'north'),
      east: toNumber(east, 'east'),
    });
    await print(client().overlaps(envelope, toOptionalNumber(options.limit, 'limit') ?? 0, options.type));
  });

  return program;
}

// ============================================================================
// Entry
// ============================================================================

/**
 * Run one command line (without the node and script arguments)
 */
export async function runCli(argv: readonly string[], deps: CliDeps = defaultDeps): Promise<ExitCode> {
  const program = createProgram(deps);

  try {
    await program.parseAsync([...argv], { from: 'user' });
    return EXIT_CODES.SUCCESS;
  } catch (error) {
    const code = exitCodeFor(error);

    // Commander has already written its own usage message
    if (error instanceof CommanderError) {
      return code;
    }

    const payload = isGeoLayerError(error)
      ? { error: { kind: error.kind, statusCode: error.statusCode, message: error.message } }
      : { error: { message: error instanceof Error ? error.message : String(error) } };
    deps.io.err(`${JSON.stringify(payload)}\n`);
    return code;
  }
}
