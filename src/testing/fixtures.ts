/**
 * Wire fixtures shared by tests.
 */

import type { JsonObject } from '../model/wire';

const transform = { scaleX: 1, scaleY: 1, unit: 'EMU' };
const size = {
  width: { magnitude: 3_000_000, unit: 'EMU' },
  height: { magnitude: 1_000_000, unit: 'EMU' },
};

/** Size and transform for a page element that is not a group. */
export const elementGeometry = { size, transform };

export const templateDeckJson: JsonObject = {
  presentationId: 'template-1',
  title: 'Invoice',
  slides: [
    {
      objectId: 's1',
      pageElements: [
        {
          objectId: 'greeting',
          ...elementGeometry,
          shape: {
            shapeType: 'TEXT_BOX',
            text: { textElements: [{ textRun: { content: 'Dear {{name}}, you owe {{amount}}\n' } }] },
          },
        },
        {
          objectId: 'logo',
          ...elementGeometry,
          title: '{{logo}}',
          image: { contentUrl: 'https://example.com/old.png' },
        },
      ],
    },
    {
      objectId: 's2',
      pageElements: [
        {
          objectId: 'grp',
          transform,
          elementGroup: {
            children: [
              {
                objectId: 'inner',
                ...elementGeometry,
                shape: { shapeType: 'TEXT_BOX', text: { textElements: [{ textRun: { content: 'Hi {{name}}' } }] } },
              },
            ],
          },
        },
        {
          objectId: 'tbl',
          ...elementGeometry,
          table: {
            rows: 1,
            columns: 1,
            tableRows: [{ tableCells: [{ text: { textElements: [{ textRun: { content: '{{quarter}}' } }] } }] }],
          },
        },
      ],
    },
  ],
};
