#!/usr/bin/env node

/**
 * signet CLI - Compact Token Command Line Interface
 *
 * Commands:
 * - signet keygen: Generate an HMAC secret or a key pair
 * - signet sign: Create a signed token
 * - signet verify: Verify a token
 * - signet inspect: Decode and display token contents
 */

import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import * as fs from 'fs';

import {
  ALGORITHM_CONFIG,
  Algorithm,
  DecodedToken,
  SigningKey,
  decodeToken,
  generateKeyPair,
  generateSecret,
  generateTokenId,
  isHmacAlgorithm,
  base64urlEncode,
  signToken,
  splitClaims,
  verifyToken,
  VERSION,
} from '../index';
import {
  describeError,
  formatTimestamp,
  getTimeRemaining,
  isExpired,
  loadPemKey,
  parseAlgorithm,
  parseClaimsJson,
} from './format';

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

/**
 * Print styled output
 */
const print = {
  success: (msg: string) => console.log(chalk.green('✓'), msg),
  error: (msg: string) => console.error(chalk.red('✗'), msg),
  warn: (msg: string) => console.log(chalk.yellow('⚠'), msg),
  info: (msg: string) => console.log(chalk.blue('ℹ'), msg),
  header: (msg: string) => console.log(chalk.bold.cyan('\n' + msg)),
  dim: (msg: string) => console.log(chalk.dim(msg)),
  json: (obj: unknown) => console.log(JSON.stringify(obj, null, 2)),
};

function fail(msg: string): never {
  print.error(msg);
  process.exit(1);
}

function parseSeconds(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a non-negative whole number of seconds.');
  }
  return parsed;
}

function parseAlgorithmOption(value: string): Algorithm {
  try {
    return parseAlgorithm(value);
  } catch (err) {
    throw new InvalidArgumentError(describeError(err));
  }
}

/**
 * Accept a token either inline or as a path to a file containing it
 */
function readTokenArgument(token: string): string {
  if (fs.existsSync(token)) {
    return fs.readFileSync(token, 'utf8').trim();
  }
  return token.trim();
}

/**
 * Resolve `--secret` or `--key <pem file>` into a signing key
 */
function resolveKey(options: { secret?: string; key?: string }, use: 'sign' | 'verify'): SigningKey {
  if (options.secret !== undefined) {
    return options.secret;
  }
  if (options.key !== undefined) {
    try {
      return loadPemKey(fs.readFileSync(options.key, 'utf8'), use);
    } catch (err) {
      fail(`Failed to load key from ${options.key}: ${describeError(err)}`);
    }
  }
  fail('Provide either --secret or --key');
}

function decodeOrFail(token: string): DecodedToken {
  try {
    return decodeToken(token);
  } catch (err) {
    fail(`Invalid token: ${describeError(err)}`);
  }
}

function writeOutput(content: string, filePath?: string): void {
  if (filePath && filePath !== '-') {
    fs.writeFileSync(filePath, content);
    print.success(`Written to ${filePath}`);
  } else {
    console.log(content);
  }
}

// ============================================================================
// COMMANDS
// ============================================================================

/**
 * keygen command - Generate a secret or key pair
 */
async function keygenCommand(options: { algorithm: Algorithm; bits?: number; output?: string; publicOut?: string }) {
  const { algorithm } = options;
  const config = ALGORITHM_CONFIG[algorithm];

  print.header('Generating Key Material');
  print.info(`Algorithm: ${chalk.bold(algorithm)}`);

  try {
    if (isHmacAlgorithm(algorithm)) {
      writeOutput(base64urlEncode(generateSecret(algorithm)), options.output);
      print.success('Secret generated successfully');
      return;
    }

    if (config.kind === 'rsa' || config.kind === 'rsa-pss') {
      print.info(`Modulus Length: ${chalk.bold(options.bits ?? 2048)} bits`);
    } else if (config.kind === 'ec') {
      print.info(`Curve: ${config.curve}`);
    }

    const { privateKey, publicKey } = await generateKeyPair(algorithm, options.bits);
    const privatePem = privateKey.export({ type: 'pkcs8', format: 'pem' }).toString();
    const publicPem = publicKey.export({ type: 'spki', format: 'pem' }).toString();

    if (options.output) {
      writeOutput(privatePem, options.output);
      writeOutput(publicPem, options.publicOut || options.output.replace(/\.pem$/, '') + '.pub.pem');
    } else {
      console.log('\n' + chalk.bold('Private Key:'));
      console.log(privatePem);
      console.log(chalk.bold('Public Key:'));
      console.log(publicPem);
    }

    print.success('Key pair generated successfully');
  } catch (err) {
    fail(`Failed to generate key material: ${describeError(err)}`);
  }
}

/**
 * sign command - Create a signed token
 */
function signCommand(options: {
  algorithm: Algorithm;
  secret?: string;
  key?: string;
  claims?: string;
  maxAge?: number;
  id?: boolean;
}) {
  const key = resolveKey(options, 'sign');

  try {
    const claims = options.claims ? parseClaimsJson(options.claims) : {};
    const token = signToken({
      algorithm: options.algorithm,
      key,
      claims: options.id ? [claims, { jti: generateTokenId() }] : [claims],
      maxAge: options.maxAge,
    });
    console.log(token);
  } catch (err) {
    fail(`Failed to sign token: ${describeError(err)}`);
  }
}

/**
 * verify command - Verify signature and time claims
 */
function verifyCommand(
  token: string,
  options: { secret?: string; key?: string; leeway?: number; algorithm?: Algorithm[] }
) {
  const tokenContent = readTokenArgument(token);
  const key = resolveKey(options, 'verify');

  print.header('Verifying Token');

  const result = verifyToken({
    token: tokenContent,
    key,
    leeway: options.leeway,
    algorithms: options.algorithm,
  });

  if (!result.valid) {
    fail(`${chalk.bold(result.error.errorKey)}: ${result.error.message}`);
  }

  const { header, claims } = result.token;
  print.info(`Algorithm: ${header.alg}`);
  if (claims.exp !== undefined) {
    print.info(`Expires: ${formatTimestamp(claims.exp)} (${getTimeRemaining(claims.exp)})`);
  }
  print.success('Token is valid');
}

/**
 * inspect command - Decode and display token contents
 */
function inspectCommand(token: string, options: { json?: boolean }) {
  const tokenContent = readTokenArgument(token);

  const { header, claims } = decodeOrFail(tokenContent);

  if (options.json) {
    print.json({ header, claims });
    return;
  }

  print.header('Token Details');
  print.warn('Signature has NOT been verified');

  console.log(chalk.bold('\nHeader:'));
  console.log(`  ${chalk.dim('Algorithm:')}   ${chalk.cyan(header.alg)}`);
  console.log(`  ${chalk.dim('Type:')}        ${chalk.cyan(header.typ ?? '-')}`);

  const { standard, custom } = splitClaims(claims);

  const identity: [string, string | undefined][] = [
    ['Issuer', standard.iss],
    ['Subject', standard.sub],
    ['Token ID', standard.jti],
  ];
  if (identity.some(([, value]) => value !== undefined)) {
    console.log(chalk.bold('\nIdentity:'));
    for (const [label, value] of identity) {
      if (value !== undefined) {
        console.log(`  ${chalk.dim((label + ':').padEnd(12))} ${chalk.white(value)}`);
      }
    }
  }

  if (standard.aud !== undefined) {
    console.log(chalk.bold('\nAudience:'));
    const audiences = Array.isArray(standard.aud) ? standard.aud : [standard.aud];
    audiences.forEach(a => console.log(`  ${chalk.dim('•')} ${a}`));
  }

  if (standard.iat !== undefined || standard.nbf !== undefined || standard.exp !== undefined) {
    console.log(chalk.bold('\nTimestamps:'));
    if (standard.iat !== undefined) {
      console.log(`  ${chalk.dim('Issued At:')}   ${formatTimestamp(standard.iat)} ${chalk.dim('(iat)')}`);
    }
    if (standard.nbf !== undefined) {
      console.log(`  ${chalk.dim('Not Before:')}  ${formatTimestamp(standard.nbf)} ${chalk.dim('(nbf)')}`);
    }
    if (standard.exp !== undefined) {
      const expired = isExpired(standard.exp);
      const expColor = expired ? chalk.red : chalk.green;
      console.log(`  ${chalk.dim('Expires At:')}  ${expColor(formatTimestamp(standard.exp))} ${chalk.dim('(exp)')}`);
      console.log(
        `  ${chalk.dim('Status:')}      ${expired ? chalk.red('EXPIRED') : chalk.green('VALID')} (${getTimeRemaining(standard.exp)})`
      );
    }
  }

  const customClaims = Object.entries(custom);
  if (customClaims.length > 0) {
    console.log(chalk.bold('\nCustom Claims:'));
    customClaims.forEach(([k, v]) => {
      console.log(`  ${chalk.dim(k + ':')} ${JSON.stringify(v)}`);
    });
  }
}

// ============================================================================
// CLI PROGRAM
// ============================================================================

function collectAlgorithm(value: string, previous: Algorithm[] | undefined): Algorithm[] {
  return [...(previous ?? []), parseAlgorithmOption(value)];
}

const program = new Command();

program
  .name('signet')
  .description(chalk.cyan('Compact signed token CLI'))
  .version(VERSION, '-v, --version')
  .addHelpText('after', `
${chalk.bold('Examples:')}
  ${chalk.dim('# Generate an ES256 key pair')}
  $ signet keygen -a ES256 -o keys/signing-key.pem

  ${chalk.dim('# Sign a token valid for 15 minutes')}
  $ signet sign -a ES256 --key keys/signing-key.pem --claims '{"sub":"user-1"}' --max-age 900

  ${chalk.dim('# Verify a token with a public key')}
  $ signet verify <token> --key keys/signing-key.pub.pem

  ${chalk.dim('# Inspect a token')}
  $ signet inspect eyJhbGciOiJFUzI1NiIsInR5cCI6Ikp...
`);

program
  .command('keygen')
  .description('Generate an HMAC secret or a key pair (PEM)')
  .option('-a, --algorithm <alg>', 'Algorithm (HS256 ... ES512, EdDSA)', parseAlgorithmOption, Algorithm.ES256)
  .option('-b, --bits <bits>', 'RSA key size in bits (default: 2048)', parseSeconds)
  .option('-o, --output <file>', 'Output file for the secret or private key')
  .option('-p, --public-out <file>', 'Output file for public key')
  .action(keygenCommand);

program
  .command('sign')
  .description('Create a signed token')
  .option('-a, --algorithm <alg>', 'Signing algorithm', parseAlgorithmOption, Algorithm.HS256)
  .option('-s, --secret <secret>', 'HMAC secret')
  .option('-k, --key <file>', 'Private key file (PEM)')
  .option('-c, --claims <json>', 'Claims as a JSON object')
  .option('-m, --max-age <seconds>', 'Fill iat and exp with this lifetime', parseSeconds)
  .option('--id', 'Add a random jti claim')
  .action(signCommand);

program
  .command('verify <token>')
  .description('Verify the signature and time claims of a token')
  .option('-s, --secret <secret>', 'HMAC secret')
  .option('-k, --key <file>', 'Public key file (PEM)')
  .option('-l, --leeway <seconds>', 'Clock skew tolerance', parseSeconds)
  .option('-a, --algorithm <alg>', 'Accept only this algorithm (repeatable)', collectAlgorithm)
  .action(verifyCommand);

program
  .command('inspect <token>')
  .description('Decode and display the contents of a token without verifying it')
  .option('-j, --json', 'Output as JSON')
  .action(inspectCommand);

if (!process.argv.slice(2).length) {
  program.outputHelp();
} else {
  program.parseAsync().catch(err => fail(describeError(err)));
}
