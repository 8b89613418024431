type ChalkFormatter = (text: string) => string;

function buildFormatter(openCode: number, closeCode: number): ChalkFormatter {
  return (text: string) => `\u001B[${openCode}m${text}\u001B[${closeCode}m`;
}

const chalkMock = {
  red: buildFormatter(31, 39),
  yellow: buildFormatter(33, 39),
};

export default chalkMock;
