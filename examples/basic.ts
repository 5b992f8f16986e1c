import { MnistReader, printImage } from '../src/index';

async function main() {
  const mnist = new MnistReader('mnist-data');
  await mnist.load();

  console.log(`Train data size: ${mnist.trainData.length}`);
  console.log(`Test data size: ${mnist.testData.length}`);
  console.log(`Train labels size: ${mnist.trainLabels.length}`);
  console.log(`Test labels size: ${mnist.testLabels.length}`);

  // First training image and its label
  printImage(mnist.trainData[0]);
  console.log(`labels[0]=${mnist.trainLabels[0]}`);
}

main().catch(err => {
  console.error(err);
  process.exit(1);
});
