// Copyright 2017 Sidewalk Labs | apache.org/licenses/LICENSE-2.0
import * as _ from 'lodash';

import { parseNumber } from './utils';

type FlagType = 'boolean' | 'string' | 'number';

interface FlagSpec {
  description: string;
  type: FlagType;
}

/**
 * Command line flag parser.
 *
 * - all flags are optional
 * - flags may be specified anywhere in the command line
 * - flags only have long forms (--long-name)
 * - boolean flags take no value and default to false.
 * - string and number flags take their value as --name=value and default to undefined.
 */
class Flags {
  private flags: {[name: string]: FlagSpec} = {};  // flag name --> spec
  private isParsed = false;
  private flagValues: {[name: string]: boolean | string | number} = {};
  private unparsedArgs: string[] = [];
  private appVersion = '';
  private appDescription = '';

  /** Register a new boolean flag. */
  addFlag(name: string, description: string) {
    return this.add(name, description, 'boolean');
  }

  /** Register a flag which takes a value, e.g. --speed=40. */
  addValueFlag(name: string, description: string, type: 'string' | 'number' = 'string') {
    return this.add(name, description, type);
  }

  version(version: string) {
    this.appVersion = version;
    return this;
  }

  description(description: string) {
    this.appDescription = description;
    return this;
  }

  /** Parse command line arguments. */
  parse(fullArgs: string[]) {
    if (this.isParsed) {
      throw new Error('Tried to parse arguments twice.');
    }
    const args = fullArgs.slice(2);  // remove ['node', 'program.js']

    // Take care of a few special cases: -h / --help, -v / --version
    if (args[0] === '-h' || args[0] === '--help') {
      this.usage();
      process.exit(0);
    }
    if (args[0] === '-v' || args[0] === '--version') {
      console.log(this.appVersion);
      process.exit(0);
    }

    for (const arg of args) {
      if (arg.slice(0, 2) === '--') {
        this.parseFlag(arg.slice(2));
      } else {
        this.unparsedArgs.push(arg);
      }
    }

    this.isParsed = true;
  }

  /** Prints a usage string to stdout. */
  usage() {
    console.log(this.appDescription);
    console.log('\nOptions:\n');
    const names = _.sortBy(_.keys(this.flags));
    const labels = names.map(name => {
      const { type } = this.flags[name];
      return type === 'boolean' ? `--${name}` : `--${name}=${type.toUpperCase()}`;
    });
    const width = _.max([_.max(labels.map(label => label.length)) || 0, '-v, --version'.length]);
    console.log(`    ${_.padEnd('-h, --help', width)}  output usage information`);
    console.log(`    ${_.padEnd('-v, --version', width)}  output the version number`);
    names.forEach((name, i) => {
      console.log(`    ${_.padEnd(labels[i], width)}  ${this.flags[name].description}`);
    });
  }

  /** Get the value of a boolean command-line flag. */
  get(name: string): boolean {
    const value = this.lookup(name, 'boolean');
    return value === true;
  }

  /** Get the value of a string flag, or undefined if it wasn't set. */
  getString(name: string): string | undefined {
    const value = this.lookup(name, 'string');
    return typeof value === 'string' ? value : undefined;
  }

  /** Get the value of a numeric flag, or undefined if it wasn't set. */
  getNumber(name: string): number | undefined {
    const value = this.lookup(name, 'number');
    return typeof value === 'number' ? value : undefined;
  }

  get args(): string[] {
    return this.unparsedArgs;
  }

  private add(name: string, description: string, type: FlagType) {
    if (name in this.flags) {
      throw new Error(`Added flag ${name} twice.`);
    }
    this.flags[name] = { description, type };
    return this;
  }

  private lookup(name: string, type: FlagType) {
    if (!this.isParsed) {
      throw new Error(`Tried to get value of flag ${name} before argument parsing.`);
    }
    const spec = this.flags[name];
    if (!spec) {
      throw new Error(`Tried to get value of unregistered flag ${name}.`);
    }
    if (spec.type !== type) {
      throw new Error(`Flag ${name} is a ${spec.type} flag, not a ${type} flag.`);
    }
    return this.flagValues[name];
  }

  private parseFlag(flag: string) {
    const eq = flag.indexOf('=');
    const name = eq === -1 ? flag : flag.slice(0, eq);
    const spec = this.flags[name];
    if (!spec) {
      throw new Error(`Found invalid flag --${name}`);
    }
    if (spec.type === 'boolean') {
      if (eq !== -1) {
        throw new Error(`Flag --${name} doesn't take a value.`);
      }
      this.flagValues[name] = true;
      return;
    }

    if (eq === -1) {
      throw new Error(`Flag --${name} requires a value (--${name}=...).`);
    }
    const text = flag.slice(eq + 1);
    this.flagValues[name] = spec.type === 'number' ? parseNumber(text) : text;
  }
}

export default Flags;
