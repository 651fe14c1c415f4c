export const singleRegionTemplate = `# pagevector single region layout
version: "1.0"
title: My Panel

rows:
  - - id: main
      components:
        - type: label
          text: Hello
          font: { size: 24 }
        - type: checkbox
          text: Enabled
          selected: true
`;
