import { createReadStream, createWriteStream } from 'node:fs';
import fs from 'node:fs/promises';
import path from 'node:path';
import { Readable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import { S3Client, PutObjectCommand, GetObjectCommand, DeleteObjectCommand } from '@aws-sdk/client-s3';
import mime from 'mime';
import type { ObjectStore } from './objectStore';

export class S3ObjectStore implements ObjectStore {
  constructor(private readonly s3: S3Client) {}

  // Envia o arquivo local em stream; o ContentType vem da extensão
  async putObject(bucket: string, key: string, filePath: string): Promise<void> {
    const stats = await fs.stat(filePath);
    await this.s3.send(new PutObjectCommand({
      Bucket: bucket,
      Key: key,
      Body: createReadStream(filePath),
      ContentLength: stats.size,
      ContentType: mime.getType(path.basename(filePath)) ?? undefined,
    }));
  }

  // Baixa o objeto para destinationPath e devolve o ContentType gravado no bucket
  async getObject(bucket: string, key: string, destinationPath: string): Promise<{ contentType?: string }> {
    const res = await this.s3.send(new GetObjectCommand({ Bucket: bucket, Key: key }));
    const body = res.Body;
    // Sem corpo não há o que gravar
    if (!body) {
      throw new Error(`Empty body for ${key}`);
    }
    // No Node o SDK devolve um Readable; senão lê tudo de uma vez
    if (body instanceof Readable) {
      await pipeline(body, createWriteStream(destinationPath));
    } else {
      await fs.writeFile(destinationPath, await body.transformToByteArray());
    }
    return { contentType: res.ContentType };
  }

  async deleteObject(bucket: string, key: string): Promise<void> {
    await this.s3.send(new DeleteObjectCommand({ Bucket: bucket, Key: key }));
  }
}
