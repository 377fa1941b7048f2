/**
 * Run Mode Value Object
 * Flags that decide how a run treats previous state on disk
 */
export interface RunModeProps {
  downloadOnly?: boolean;
  force?: boolean;
  resume?: boolean;
  reverse?: boolean;
  verbose?: boolean;
}

export class RunModeVO {
  private constructor(
    public readonly downloadOnly: boolean,
    public readonly force: boolean,
    public readonly resume: boolean,
    public readonly reverse: boolean,
    public readonly verbose: boolean,
  ) {}

  static create(props: RunModeProps = {}): RunModeVO {
    const force = props.force ?? false;
    const resume = props.resume ?? false;

    if (force && resume) {
      throw new Error('Force and resume modes are mutually exclusive');
    }

    return new RunModeVO(
      props.downloadOnly ?? false,
      force,
      resume,
      props.reverse ?? false,
      props.verbose ?? false,
    );
  }

  static default(): RunModeVO {
    return RunModeVO.create();
  }

  /** Existing local archives are reused unless a refresh is forced */
  reusesLocalArchives(): boolean {
    return !this.force;
  }

  writesOutput(): boolean {
    return !this.downloadOnly;
  }

  toJSON(): Required<RunModeProps> {
    return {
      downloadOnly: this.downloadOnly,
      force: this.force,
      resume: this.resume,
      reverse: this.reverse,
      verbose: this.verbose,
    };
  }
}
