import type { Tag } from '@aws-sdk/client-ec2'

// Tags written onto every rebuilt volume so it can be traced back to what it replaced
export const ORIGINAL_INSTANCE_TAG = 'Original Instance'
export const ORIGINAL_ATTACHMENT_TAG = 'Original Attachment'

// Read from snapshots only, to find the instance whose userData gets cloned
export const SOURCE_INSTANCE_TAG = 'Source Instance Id'

// Flattens an EC2 tag list into a name -> value record
export function tagsToRecord( tags: Tag[] | undefined ): Record<string, string> {
    const tagsObj: Record<string, string> = {}

    for ( const tag of tags ?? [] ) {
        if ( tag.Key === undefined ) {
            continue
        }
        tagsObj[ tag.Key ] = tag.Value ?? ''
    }

    return tagsObj
}

export interface ProvenanceTagOptions {
    originalInstance: string
    originalDevice: string
    name?: string
}

export function buildProvenanceTags( options: ProvenanceTagOptions ): Tag[] {
    const tags: Tag[] = [
        { Key: ORIGINAL_INSTANCE_TAG, Value: options.originalInstance },
        { Key: ORIGINAL_ATTACHMENT_TAG, Value: options.originalDevice },
    ]
    if ( options.name ) {
        tags.push( { Key: 'Name', Value: options.name } )
    }
    return tags
}
