import { EC2Client } from '@aws-sdk/client-ec2'
import { SSMClient } from '@aws-sdk/client-ssm'
import { Command } from 'commander'
import inquirer from 'inquirer'
import {
    buildRecoveryConfig,
    DEFAULT_INSTANCE_TYPE,
    DEFAULT_REGION,
    DEFAULT_SEARCH_TAG,
    getDefaultsFromSsm,
    mergeOptions,
    recoveryOptionsSchema,
} from './config'
import type { RecoveryOptions } from './config'
import { Ec2ClientApi } from './ec2Api'
import { runRecovery } from './recovery'
import type { RecoveryHooks, RecoveryPlan, RecoveryResult } from './recovery'
import { writeRecoveryReport } from './report'
import { ORIGINAL_ATTACHMENT_TAG, ORIGINAL_INSTANCE_TAG } from './tagUtils'

export function buildProgram(): Command {
    return new Command()
        .name( 'snap-restore' )
        .description( 'Rebuild an EC2 instance from a tagged group of EBS snapshots' )
        .option( '-a, --recovery-ami <id>', 'AMI ID to launch recovery-instance from' )
        .option( '-e, --ebs-type <type>', 'Type of EBS volume to create from snapshots: gp2 or io1 (default: gp2)' )
        .option( '-i, --iops-ratio <ratio>', 'Provisioned IOPS per GiB, 3-50 (mandatory for io1; ignored for gp2)' )
        .option( '-k, --provisioning-key <name>', 'SSH key-pair to provision recovery-instance with' )
        .option( '-n, --recovery-ec2name <name>', 'Name to assign to recovery-instance (default: "Recovery of <search-string>")' )
        .option( '-P, --power-on', 'Power on the recovered instance' )
        .option( '-r, --root-snapid <id>', 'Snapshot-ID of original instance\'s root EBS (not yet implemented)' )
        .option( '-S, --search-string <value>', 'Value of the snapshot-group tag to recover' )
        .option( '-s, --deployment-subnet <id>', 'Subnet ID to deploy recovery-instance into' )
        .option( '-t, --instance-type <type>', `Instance-type to use for recovery-instance (default: ${DEFAULT_INSTANCE_TYPE})` )
        .option( '-U, --user-data-file <path>', 'Inject userData from selected file' )
        .option( '-u, --user-data-clone', 'Clone userData from source instance' )
        .option( '-x, --access-groups <list>', 'Comma-separated security-groups to assign to recovery-instance (max 5)' )
        .option( '-z, --availability-zone <zone>', 'Availability zone to rebuild in (default: the subnet\'s)' )
        .option( '--alt-search-tag <name>', `Snapshot tag used to find grouped snapshots (default: "${DEFAULT_SEARCH_TAG}")` )
        .option( '--alt-ec2-tag <name>', `Snapshot tag containing original EC2 ID (default: "${ORIGINAL_INSTANCE_TAG}")` )
        .option( '--alt-device-tag <name>', `Snapshot tag containing original attachment device (default: "${ORIGINAL_ATTACHMENT_TAG}")` )
        .option( '--region <region>', `AWS region (default: AWS_REGION or ${DEFAULT_REGION})` )
        .option( '--defaults-parameter <name>', 'SSM parameter holding a JSON object of option defaults' )
        .option( '--poll-interval <seconds>', 'Seconds between state checks (default: 10)' )
        .option( '--max-poll-attempts <count>', 'Give up a wait after this many checks, 0 waits forever (default: 0)' )
        .option( '--dry-run', 'Validate and print the recovery plan without creating anything' )
        .option( '-y, --yes', 'Do not ask for confirmation' )
        .option( '--report', 'Write a recovery-report JSON file when done' )
}

// Parses argv into options; commander reports malformed values and exits
export function parseCliOptions( program: Command, argv: string[] ): RecoveryOptions {
    program.parse( argv )

    const parsed = recoveryOptionsSchema.safeParse( program.opts() )
    if ( !parsed.success ) {
        return program.error( parsed.error.issues.map( issue => `${issue.path.join( '.' )}: ${issue.message}` ).join( '\n' ) )
    }
    return parsed.data
}

async function confirmRecovery( plan: RecoveryPlan ): Promise<boolean> {
    console.dir( plan, { depth: null } )
    const answer = await inquirer.prompt<{ proceed: boolean }>( [ {
        type: 'confirm',
        name: 'proceed',
        message: `Create ${plan.volumes.length} volume(s) and recovery-instance '${plan.instanceName}' in ${plan.buildZone}?`,
        default: false
    } ] )
    return answer.proceed
}

// A failed run still leaves a report of what it created when one was asked for
export function recoveryHooks( writeReport: boolean, saveReport: ( result: RecoveryResult ) => string = writeRecoveryReport ): RecoveryHooks {
    return {
        confirm: confirmRecovery,
        onFailure: partial => {
            if ( writeReport ) {
                saveReport( partial )
            }
        },
    }
}

async function resolveOptions( cliOptions: RecoveryOptions ): Promise<RecoveryOptions> {
    if ( !cliOptions.defaultsParameter ) {
        return cliOptions
    }
    const region = cliOptions.region ?? process.env.AWS_REGION ?? DEFAULT_REGION
    const storedDefaults = await getDefaultsFromSsm( new SSMClient( { region } ), cliOptions.defaultsParameter )
    return mergeOptions( storedDefaults, cliOptions )
}

export async function cliEntrypoint( argv: string[] = process.argv ): Promise<void> {
    const cliOptions = parseCliOptions( buildProgram(), argv )

    const config = buildRecoveryConfig( await resolveOptions( cliOptions ) )
    const ec2Api = new Ec2ClientApi( new EC2Client( { region: config.region } ) )

    const result = await runRecovery( config, ec2Api, recoveryHooks( config.writeReport ) )

    if ( config.writeReport && result.outcome === 'completed' ) {
        writeRecoveryReport( result )
    }
}
