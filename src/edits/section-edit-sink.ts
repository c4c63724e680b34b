import { BadRequestError } from '../errors.js';
import type { EditFields, EditSink, EditTarget, QueryParams, Transport } from '../types.js';

/**
 * Applies edits through the library section the targets belong to, as one
 * `PUT /library/sections/<id>/all` naming every target's rating key.
 */
export class SectionEditSink implements EditSink {
  constructor(private readonly transport: Transport) {}

  async applyEdits(targets: readonly EditTarget[], fields: Readonly<EditFields>): Promise<void> {
    if (targets.length === 0) return;

    const sectionIds = new Set(targets.map((t) => t.librarySectionID));
    const [sectionId] = sectionIds;
    if (sectionIds.size !== 1 || sectionId === undefined || sectionId === null) {
      throw new BadRequestError('Edited items must all belong to one library section');
    }

    const ratingKeys: number[] = [];
    for (const target of targets) {
      if (target.ratingKey === null) {
        throw new BadRequestError(`Cannot edit ${target.key ?? 'an item'} without a ratingKey`);
      }
      ratingKeys.push(target.ratingKey);
    }

    const params: QueryParams = {
      id: ratingKeys.join(','),
      includeExternalMedia: 1,
      ...fields,
    };
    await this.transport.query(`/library/sections/${sectionId}/all`, { method: 'PUT', params });
  }
}
