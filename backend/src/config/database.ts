import mongoose from "mongoose";

export async function connectDatabase(uri: string): Promise<void> {
  mongoose.connection.on("error", (error) => {
    console.error("❌ MongoDB connection error:", error);
  });

  await mongoose.connect(uri);
  console.log(`🗄️  Connected to MongoDB (${mongoose.connection.name})`);
}

export async function disconnectDatabase(): Promise<void> {
  await mongoose.disconnect();
}
