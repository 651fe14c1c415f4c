export const demoTemplate = `# pagevector demo layout
version: "1.0"
title: Converter Demo
background: "#ffffff"

rows:
  - - id: top
      axis: page
      components:
        - type: label
          text: Goodbye
          font: { family: sans-serif, style: bold, size: 48 }
        - type: checkbox
          text: Maybe
  - - id: bottom-left
      axis: page
      components:
        - type: label
          text: Cruel
          font: { family: sans-serif, style: italic, size: 36 }
        - type: checkbox
          text: "Yes"
    - id: bottom-right
      axis: page
      components:
        - type: label
          text: World
          font: { family: sans-serif, style: italic, size: 36 }
        - type: checkbox
          text: "No"

export:
  paper: letter
  colorMode: rgb
  vectorizeText: false
`;
